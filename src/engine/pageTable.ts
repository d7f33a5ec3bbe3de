import { validateMemoryLayout } from "../core/config";
import { UnschedulableProcessError } from "../core/errors";
import type { ProcessDescriptor } from "../core/process";
import type { Frame, OccupancyRecord, PageTable } from "../core/memory";

export function createPageTable(totalMemory: number, pageSize: number): PageTable {
  validateMemoryLayout(totalMemory, pageSize);

  const frameCount = totalMemory / pageSize;
  return {
    totalMemory,
    pageSize,
    frameCount,
    frames: Array<Frame>(frameCount).fill(null),
  };
}

export function pagesForSegment(size: number, pageSize: number): number {
  return Math.ceil(size / pageSize);
}

export function pagesForSegments(
  segments: readonly number[],
  pageSize: number
): number {
  let total = 0;
  for (const size of segments) {
    total += pagesForSegment(size, pageSize);
  }
  return total;
}

// Rejects the first process that could not fit even in empty memory.
export function assertSchedulable(
  table: PageTable,
  descriptors: readonly ProcessDescriptor[]
) {
  for (const d of descriptors) {
    const pages = pagesForSegments(d.segments, table.pageSize);
    if (pages > table.frameCount) {
      throw new UnschedulableProcessError(d.id, pages, table.frameCount);
    }
  }
}

export function freeFrameCount(table: PageTable): number {
  let free = 0;
  for (const frame of table.frames) {
    if (frame === null) free++;
  }
  return free;
}

export function ownerOf(table: PageTable, frameIndex: number): number | null {
  const frame = table.frames[frameIndex];
  return frame ? frame.processId : null;
}

export function framesOwnedBy(table: PageTable, processId: number): number[] {
  const owned: number[] = [];
  table.frames.forEach((frame, index) => {
    if (frame !== null && frame.processId === processId) owned.push(index);
  });
  return owned;
}

// Frees every frame owned by the process. Returns how many were freed.
export function deallocate(table: PageTable, processId: number): number {
  let freed = 0;
  for (let i = 0; i < table.frameCount; i++) {
    const frame = table.frames[i];
    if (frame !== null && frame.processId === processId) {
      table.frames[i] = null;
      freed++;
    }
  }
  return freed;
}

/**
 * Grants every segment of a process, or nothing at all.
 *
 * Feasibility is checked against the global free-frame count first, so a
 * refusal leaves the table untouched. Segments are then placed one after
 * another, each claiming the lowest-indexed free frames; a segment's frames
 * need not be contiguous.
 */
export function allocate(
  table: PageTable,
  processId: number,
  segments: readonly number[]
): boolean {
  const needed = pagesForSegments(segments, table.pageSize);

  if (freeFrameCount(table) < needed) {
    return false;
  }

  let pageNumber = 0;

  for (const size of segments) {
    const pagesNeeded = pagesForSegment(size, table.pageSize);
    let claimed = 0;

    for (let i = 0; i < table.frameCount && claimed < pagesNeeded; i++) {
      if (table.frames[i] === null) {
        pageNumber++;
        table.frames[i] = { processId, pageNumber };
        claimed++;
      }
    }

    // Unreachable after the pre-check, but ownership must never be partial.
    if (claimed < pagesNeeded) {
      deallocate(table, processId);
      return false;
    }
  }

  return true;
}

export function occupancyReport(table: PageTable): OccupancyRecord[] {
  const { pageSize } = table;
  const report: OccupancyRecord[] = [];
  let freeStart: number | null = null;

  for (let index = 0; index < table.frameCount; index++) {
    const frame = table.frames[index];
    const start = index * pageSize;

    if (frame === null) {
      if (freeStart === null) freeStart = start;
      continue;
    }

    if (freeStart !== null) {
      report.push({ kind: "free", start: freeStart, end: start - 1 });
      freeStart = null;
    }

    report.push({
      kind: "owned",
      start,
      end: start + pageSize - 1,
      processId: frame.processId,
      pageNumber: frame.pageNumber,
    });
  }

  if (freeStart !== null) {
    report.push({
      kind: "free",
      start: freeStart,
      end: table.frameCount * pageSize - 1,
    });
  }

  return report;
}

// Inverse of occupancyReport: one owner id (or null) per frame.
export function framesFromReport(
  report: readonly OccupancyRecord[],
  pageSize: number
): Array<number | null> {
  const frames: Array<number | null> = [];

  for (const record of report) {
    const count = (record.end - record.start + 1) / pageSize;
    for (let i = 0; i < count; i++) {
      frames.push(record.kind === "owned" ? record.processId : null);
    }
  }

  return frames;
}
