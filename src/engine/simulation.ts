import { type SimulationConfig, resolveConfig } from "../core/config";
import type { SimulationEvent } from "../core/events";
import { logger } from "../core/logger";
import type { SimulationSummary } from "../core/metrics";
import { type ProcessDescriptor, createProcess, validateDescriptors } from "../core/process";
import type { SimulationState } from "../core/state";
import { summarize } from "./metrics";
import { createPageTable } from "./pageTable";
import { createQueue } from "./queue";
import { tick } from "./tick";

export type SimulationOptions = {
  onEvent?: (event: SimulationEvent) => void;
};

export type SimulationResult = {
  state: SimulationState;
  events: SimulationEvent[];
  summary: SimulationSummary;
};

export function createSimulation(
  descriptors: readonly ProcessDescriptor[],
  overrides: Partial<SimulationConfig> = {}
): SimulationState {
  const config = resolveConfig(overrides);
  validateDescriptors(descriptors);

  const processes = descriptors
    .map(createProcess)
    .sort((a, b) => a.arrivalTime - b.arrivalTime || a.id - b.id);

  return {
    time: 0,
    status: "running",
    config,
    processes,
    pageTable: createPageTable(config.totalMemory, config.pageSize),
    queue: createQueue(),
    metrics: { completed: 0, totalTurnaround: 0 },
  };
}

export function runToCompletion(
  state: SimulationState,
  options: SimulationOptions = {}
): SimulationResult {
  const events: SimulationEvent[] = [];

  while (state.status === "running") {
    for (const event of tick(state)) {
      events.push(event);
      options.onEvent?.(event);
    }
  }

  const summary = summarize(state);

  if (state.terminationReason === "tick-limit") {
    logger.warn(
      `simulation stopped at tick ${state.time} with ${state.metrics.completed}/${state.processes.length} processes completed`
    );
  } else {
    logger.info(`all processes completed by tick ${state.time}`);
  }

  return { state, events, summary };
}

export function runSimulation(
  descriptors: readonly ProcessDescriptor[],
  overrides: Partial<SimulationConfig> = {},
  options: SimulationOptions = {}
): SimulationResult {
  return runToCompletion(createSimulation(descriptors, overrides), options);
}
