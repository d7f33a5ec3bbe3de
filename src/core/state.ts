import type { SimulationConfig } from "./config";
import type { PageTable } from "./memory";
import type { SimulationMetrics, TerminationReason } from "./metrics";
import type { Process } from "./process";
import type { AdmissionQueue } from "../engine/queue";

export type SimulationStatus = "running" | "terminated";

export type SimulationState = {
  time: number;

  status: SimulationStatus;
  terminationReason?: TerminationReason;

  config: SimulationConfig;

  // Sorted by arrival time, then id.
  processes: Process[];
  pageTable: PageTable;
  queue: AdmissionQueue;

  metrics: SimulationMetrics;
};
