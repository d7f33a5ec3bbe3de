import type { SimulationMetrics, SimulationSummary } from "../core/metrics";
import type { SimulationState } from "../core/state";
import { freeFrameCount } from "./pageTable";

export function averageTurnaround(metrics: SimulationMetrics): number | null {
  return metrics.completed > 0
    ? metrics.totalTurnaround / metrics.completed
    : null;
}

export function summarize(state: SimulationState): SimulationSummary {
  return {
    completed: state.metrics.completed,
    totalTurnaround: state.metrics.totalTurnaround,
    averageTurnaround: averageTurnaround(state.metrics),
    endTime: state.time,
    terminationReason: state.terminationReason,
  };
}

export type FrameUsage = {
  frameCount: number;
  free: number;
  // frames held by each resident process, keyed by id
  resident: Map<number, number>;
};

export function frameUsage(state: SimulationState): FrameUsage {
  const resident = new Map<number, number>();

  for (const p of state.processes) {
    if (p.status === "resident") resident.set(p.id, 0);
  }

  for (const frame of state.pageTable.frames) {
    if (frame === null) continue;
    resident.set(frame.processId, (resident.get(frame.processId) ?? 0) + 1);
  }

  return {
    frameCount: state.pageTable.frameCount,
    free: freeFrameCount(state.pageTable),
    resident,
  };
}
