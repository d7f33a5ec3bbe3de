import type { SimulationEvent } from "../core/events";
import type { SimulationState } from "../core/state";
import { freeFrameCount } from "./pageTable";
import { isEmpty } from "./queue";
import { schedule } from "./scheduler";

export function isDrained(state: SimulationState): boolean {
  return (
    isEmpty(state.queue) &&
    freeFrameCount(state.pageTable) === state.pageTable.frameCount &&
    state.processes.every((p) => p.status === "completed")
  );
}

/**
 * Runs one clock tick and returns the events it produced, in order.
 *
 * On termination the clock stays on the last simulated tick: either the
 * tick on which the last process completed, or `config.maxTicks`.
 */
export function tick(state: SimulationState): SimulationEvent[] {
  if (state.status === "terminated") return [];

  const events = schedule(state);

  if (isDrained(state)) {
    state.status = "terminated";
    state.terminationReason = "drained";
  } else if (state.time + 1 > state.config.maxTicks) {
    state.status = "terminated";
    state.terminationReason = "tick-limit";
  } else {
    state.time += 1;
  }

  return events;
}
