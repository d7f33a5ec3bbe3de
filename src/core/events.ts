import type { OccupancyRecord } from "./memory";

// Snapshots are taken right after the mutation the event describes.
type EventBase = {
  tick: number;
  processId: number;
  queue: number[];
  memoryMap: OccupancyRecord[];
};

export type ProcessArrived = EventBase & { type: "arrived" };
export type ProcessCompleted = EventBase & { type: "completed" };
export type ProcessAdmitted = EventBase & { type: "admitted" };

export type ProcessUnschedulable = EventBase & {
  type: "unschedulable";
  pagesNeeded: number;
  frameCount: number;
};

export type SimulationEvent =
  | ProcessArrived
  | ProcessCompleted
  | ProcessAdmitted
  | ProcessUnschedulable;

export type SimulationEventType = SimulationEvent["type"];
