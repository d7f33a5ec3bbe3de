import { MalformedInputError } from "./errors";

export type ProcessStatus = "pending" | "queued" | "resident" | "completed";

export type ProcessDescriptor = {
  readonly id: number;
  readonly arrivalTime: number;
  readonly lifetime: number;
  /** Segment sizes in KB; each is allocated independently. */
  readonly segments: readonly number[];
};

export type Process = ProcessDescriptor & {
  status: ProcessStatus;
  startedAt?: number; // tick of admission, set once
  finishedAt?: number;
};

export function createProcess(descriptor: ProcessDescriptor): Process {
  return {
    id: descriptor.id,
    arrivalTime: descriptor.arrivalTime,
    lifetime: descriptor.lifetime,
    segments: [...descriptor.segments],
    status: "pending",
  };
}

export function completionTime(process: Process): number | undefined {
  return process.startedAt === undefined
    ? undefined
    : process.startedAt + process.lifetime;
}

function describeField(index: number, field: string) {
  return `process #${index + 1}: ${field}`;
}

export function validateDescriptors(descriptors: readonly ProcessDescriptor[]) {
  const seen = new Set<number>();

  descriptors.forEach((d, index) => {
    if (!Number.isInteger(d.id) || d.id <= 0) {
      throw new MalformedInputError(
        `${describeField(index, "id")} must be a positive integer (got ${d.id})`
      );
    }
    if (seen.has(d.id)) {
      throw new MalformedInputError(
        `${describeField(index, "id")} ${d.id} is used more than once`
      );
    }
    seen.add(d.id);

    if (!Number.isInteger(d.arrivalTime) || d.arrivalTime < 0) {
      throw new MalformedInputError(
        `${describeField(index, "arrival time")} must be a non-negative integer (got ${d.arrivalTime})`
      );
    }
    if (!Number.isInteger(d.lifetime) || d.lifetime < 0) {
      throw new MalformedInputError(
        `${describeField(index, "lifetime")} must be a non-negative integer (got ${d.lifetime})`
      );
    }
    if (d.segments.length === 0) {
      throw new MalformedInputError(
        `${describeField(index, "segments")} must not be empty`
      );
    }
    for (const size of d.segments) {
      if (!Number.isInteger(size) || size <= 0) {
        throw new MalformedInputError(
          `${describeField(index, "segment size")} must be a positive integer (got ${size})`
        );
      }
    }
  });
}
