import type { SimulationEvent } from "../core/events";
import { logger } from "../core/logger";
import type { Process } from "../core/process";
import type { SimulationState } from "../core/state";
import { allocate, deallocate, occupancyReport, pagesForSegments } from "./pageTable";
import { dequeue, enqueue, peekFront, queuedIds } from "./queue";

function snapshot(state: SimulationState) {
  return {
    queue: queuedIds(state.queue),
    memoryMap: occupancyReport(state.pageTable),
  };
}

/* =========================================================
   1. ARRIVALS
   ========================================================= */

export function enqueueArrivals(state: SimulationState): SimulationEvent[] {
  const now = state.time;
  const { frameCount, pageSize } = state.pageTable;
  const events: SimulationEvent[] = [];

  // processes are kept in (arrivalTime, id) order, so ties enqueue by id
  for (const p of state.processes) {
    if (p.status !== "pending" || p.arrivalTime !== now) continue;

    p.status = "queued";
    enqueue(state.queue, p);
    events.push({ type: "arrived", tick: now, processId: p.id, ...snapshot(state) });

    const pagesNeeded = pagesForSegments(p.segments, pageSize);
    if (pagesNeeded > frameCount) {
      logger.warn(
        `t=${now}: process ${p.id} needs ${pagesNeeded} pages, memory has ${frameCount}; it will block the queue`
      );
      events.push({
        type: "unschedulable",
        tick: now,
        processId: p.id,
        pagesNeeded,
        frameCount,
        ...snapshot(state),
      });
    }
  }

  return events;
}

/* =========================================================
   2. COMPLETIONS
   ========================================================= */

export function releaseCompleted(state: SimulationState): SimulationEvent[] {
  const now = state.time;
  const events: SimulationEvent[] = [];

  for (const p of state.processes) {
    if (p.status !== "resident" || p.startedAt === undefined) continue;
    if (p.startedAt + p.lifetime !== now) continue;

    deallocate(state.pageTable, p.id);
    p.status = "completed";
    p.finishedAt = now;

    state.metrics = {
      completed: state.metrics.completed + 1,
      totalTurnaround: state.metrics.totalTurnaround + (now - p.arrivalTime),
    };

    events.push({ type: "completed", tick: now, processId: p.id, ...snapshot(state) });
  }

  return events;
}

/* =========================================================
   3. ADMISSION (strict FCFS, head-of-line blocking)
   ========================================================= */

export function admitFromQueue(state: SimulationState): SimulationEvent[] {
  const now = state.time;
  const events: SimulationEvent[] = [];

  let head: Process | undefined = peekFront(state.queue);

  while (head !== undefined) {
    if (!allocate(state.pageTable, head.id, head.segments)) {
      logger.debug(`t=${now}: process ${head.id} is waiting for memory`);
      break;
    }

    head.startedAt = now;
    head.status = "resident";
    dequeue(state.queue);
    logger.debug(`t=${now}: admitted process ${head.id}`);

    // completions for this tick already ran, so it stays resident
    if (head.lifetime === 0) {
      logger.warn(`t=${now}: process ${head.id} has zero lifetime and will never complete`);
    }

    events.push({ type: "admitted", tick: now, processId: head.id, ...snapshot(state) });

    head = peekFront(state.queue);
  }

  return events;
}

// Arrivals, then completions, then admissions, all on the current tick.
export function schedule(state: SimulationState): SimulationEvent[] {
  const arrivals = enqueueArrivals(state);
  const completions = releaseCompleted(state);
  const admissions = admitFromQueue(state);

  return [...arrivals, ...completions, ...admissions];
}
