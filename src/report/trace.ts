import type { SimulationEvent } from "../core/events";
import type { OccupancyRecord } from "../core/memory";
import type { SimulationSummary } from "../core/metrics";

const EVENT_INDENT = " ".repeat(7);
const MAP_INDENT = " ".repeat(18);

export function formatQueue(queue: readonly number[]): string {
  return `${EVENT_INDENT}Input Queue:[${queue.join(" ")}]`;
}

export function formatMemoryMap(map: readonly OccupancyRecord[]): string[] {
  const lines = [`${EVENT_INDENT}Memory Map:`];

  for (const record of map) {
    const range = `${record.start}-${record.end}`;
    lines.push(
      record.kind === "free"
        ? `${MAP_INDENT}${range}: Free frame(s)`
        : `${MAP_INDENT}${range}: Process ${record.processId}, Page ${record.pageNumber}`
    );
  }

  return lines;
}

export function formatEvent(event: SimulationEvent): string[] {
  switch (event.type) {
    case "arrived":
      return [`${EVENT_INDENT}Process ${event.processId} arrives`, formatQueue(event.queue)];

    case "completed":
      return [
        `${EVENT_INDENT}Process ${event.processId} completes`,
        ...formatMemoryMap(event.memoryMap),
        "",
      ];

    case "admitted":
      return [
        `${EVENT_INDENT}MM moves Process ${event.processId} to memory`,
        formatQueue(event.queue),
        ...formatMemoryMap(event.memoryMap),
        "",
      ];

    case "unschedulable":
      return [
        `${EVENT_INDENT}Process ${event.processId} needs ${event.pagesNeeded} pages but memory has ${event.frameCount} frames`,
      ];
  }
}

export function formatSummary(summary: SimulationSummary): string {
  return summary.averageTurnaround === null
    ? "No processes completed. Average Turnaround Time: N/A"
    : `Average Turnaround Time: ${summary.averageTurnaround.toFixed(2)}`;
}

/** Emits trace lines, writing a `t = N:` header before each tick's first event. */
export class TraceWriter {
  private lastTick: number | null = null;

  constructor(private readonly write: (line: string) => void) {}

  event(event: SimulationEvent) {
    if (event.tick !== this.lastTick) {
      this.write(`t = ${event.tick}:`);
      this.lastTick = event.tick;
    }
    for (const line of formatEvent(event)) {
      this.write(line);
    }
  }

  summary(summary: SimulationSummary) {
    this.write(formatSummary(summary));
  }
}

export function renderTrace(
  events: readonly SimulationEvent[],
  summary: SimulationSummary
): string {
  const lines: string[] = [];
  const writer = new TraceWriter((line) => lines.push(line));

  for (const event of events) writer.event(event);
  writer.summary(summary);

  return lines.join("\n") + "\n";
}
