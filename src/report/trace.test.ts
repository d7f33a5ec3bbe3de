import { describe, expect, it } from "vitest";
import { setLogLevel } from "../core/logger";
import type { ProcessArrived, ProcessUnschedulable } from "../core/events";
import { runSimulation } from "../engine/simulation";
import {
  TraceWriter,
  formatEvent,
  formatMemoryMap,
  formatQueue,
  formatSummary,
  renderTrace,
} from "./trace";

const arrived = (tick: number, processId: number, queue: number[]): ProcessArrived => ({
  type: "arrived",
  tick,
  processId,
  queue,
  memoryMap: [],
});

describe("formatting", () => {
  it("should render the input queue", () => {
    expect(formatQueue([])).toBe("       Input Queue:[]");
    expect(formatQueue([3, 1, 2])).toBe("       Input Queue:[3 1 2]");
  });

  it("should render free ranges and owned pages", () => {
    expect(
      formatMemoryMap([
        { kind: "owned", start: 0, end: 199, processId: 2, pageNumber: 1 },
        { kind: "free", start: 200, end: 1999 },
      ])
    ).toEqual([
      "       Memory Map:",
      "                  0-199: Process 2, Page 1",
      "                  200-1999: Free frame(s)",
    ]);
  });

  it("should describe an unschedulable process", () => {
    const event: ProcessUnschedulable = {
      type: "unschedulable",
      tick: 0,
      processId: 8,
      queue: [8],
      memoryMap: [],
      pagesNeeded: 12,
      frameCount: 10,
    };
    expect(formatEvent(event)).toEqual([
      "       Process 8 needs 12 pages but memory has 10 frames",
    ]);
  });

  it("should round the average to two decimals", () => {
    const base = { completed: 3, totalTurnaround: 115, endTime: 55 };
    expect(formatSummary({ ...base, averageTurnaround: 115 / 3 })).toBe(
      "Average Turnaround Time: 38.33"
    );
    expect(formatSummary({ ...base, completed: 0, averageTurnaround: null })).toBe(
      "No processes completed. Average Turnaround Time: N/A"
    );
  });
});

describe("TraceWriter", () => {
  it("should print one header per tick", () => {
    const lines: string[] = [];
    const writer = new TraceWriter((line) => lines.push(line));

    writer.event(arrived(0, 1, [1]));
    writer.event(arrived(0, 2, [1, 2]));
    writer.event(arrived(4, 3, [1, 2, 3]));

    expect(lines).toEqual([
      "t = 0:",
      "       Process 1 arrives",
      "       Input Queue:[1]",
      "       Process 2 arrives",
      "       Input Queue:[1 2]",
      "t = 4:",
      "       Process 3 arrives",
      "       Input Queue:[1 2 3]",
    ]);
  });
});

describe("renderTrace", () => {
  it("should render a complete run", () => {
    setLogLevel("silent");
    const { events, summary } = runSimulation(
      [{ id: 1, arrivalTime: 0, lifetime: 1, segments: [100] }],
      { totalMemory: 300, pageSize: 100 }
    );

    expect(renderTrace(events, summary)).toBe(
      [
        "t = 0:",
        "       Process 1 arrives",
        "       Input Queue:[1]",
        "       MM moves Process 1 to memory",
        "       Input Queue:[]",
        "       Memory Map:",
        "                  0-99: Process 1, Page 1",
        "                  100-299: Free frame(s)",
        "",
        "t = 1:",
        "       Process 1 completes",
        "       Memory Map:",
        "                  0-299: Free frame(s)",
        "",
        "Average Turnaround Time: 1.00",
        "",
      ].join("\n")
    );
  });
});
