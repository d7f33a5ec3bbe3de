// core
export * from "./core/config";
export * from "./core/errors";
export * from "./core/events";
export * from "./core/logger";
export * from "./core/memory";
export * from "./core/metrics";
export * from "./core/process";
export * from "./core/state";

// engine
export * from "./engine/pageTable";
export * from "./engine/queue";
export * from "./engine/scheduler";
export * from "./engine/tick";
export * from "./engine/metrics";
export * from "./engine/simulation";

// io / report
export * from "./io/parser";
export * from "./report/trace";

// types
export type { SimulationConfig } from "./core/config";
export type { SimulationEvent } from "./core/events";
export type { PageTable, OccupancyRecord } from "./core/memory";
export type { SimulationSummary } from "./core/metrics";
export type { Process, ProcessDescriptor } from "./core/process";
export type { SimulationState } from "./core/state";
export type { AdmissionQueue } from "./engine/queue";
