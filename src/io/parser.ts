import { readFile } from "node:fs/promises";
import { MalformedInputError } from "../core/errors";
import { type ProcessDescriptor, validateDescriptors } from "../core/process";

class TokenReader {
  private readonly tokens: string[];
  private pos = 0;

  constructor(text: string) {
    this.tokens = text.split(/\s+/).filter((t) => t.length > 0);
  }

  get done(): boolean {
    return this.pos >= this.tokens.length;
  }

  int(what: string): number {
    if (this.done) {
      throw new MalformedInputError(`unexpected end of input while reading ${what}`);
    }
    const token = this.tokens[this.pos++];
    if (!/^[+-]?\d+$/.test(token)) {
      throw new MalformedInputError(`expected an integer for ${what}, found "${token}"`);
    }
    const value = Number.parseInt(token, 10);
    if (!Number.isSafeInteger(value)) {
      throw new MalformedInputError(`integer out of range for ${what}: "${token}"`);
    }
    return value;
  }
}

/**
 * Reads a workload description: the process count, then for each process
 * its id, arrival time, lifetime, segment count and segment sizes, all as
 * whitespace-separated integers.
 */
export function parseWorkload(text: string): ProcessDescriptor[] {
  const reader = new TokenReader(text);

  const count = reader.int("the process count");
  if (count < 0) {
    throw new MalformedInputError(`process count must not be negative (got ${count})`);
  }

  const processes: ProcessDescriptor[] = [];

  for (let i = 1; i <= count; i++) {
    const id = reader.int(`process #${i} id`);
    const arrivalTime = reader.int(`process #${i} arrival time`);
    const lifetime = reader.int(`process #${i} lifetime`);
    const pieces = reader.int(`process #${i} segment count`);

    if (pieces < 0) {
      throw new MalformedInputError(
        `process #${i}: segment count must not be negative (got ${pieces})`
      );
    }

    const segments: number[] = [];
    for (let j = 1; j <= pieces; j++) {
      segments.push(reader.int(`process #${i} segment ${j} size`));
    }

    processes.push({ id, arrivalTime, lifetime, segments });
  }

  if (!reader.done) {
    throw new MalformedInputError(`unexpected data after ${count} processes`);
  }

  validateDescriptors(processes);
  return processes;
}

export async function loadWorkload(path: string): Promise<ProcessDescriptor[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedInputError(`cannot read workload file ${path}: ${reason}`);
  }
  return parseWorkload(text);
}
