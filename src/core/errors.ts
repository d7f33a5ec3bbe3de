export type SimulatorErrorKind =
  | "invalid-configuration"
  | "malformed-input"
  | "empty-queue"
  | "unschedulable-process";

export class SimulatorError extends Error {
  readonly kind: SimulatorErrorKind;

  constructor(kind: SimulatorErrorKind, message: string) {
    super(message);
    this.name = "SimulatorError";
    this.kind = kind;
  }
}

// Fatal, raised before the first tick.
export class InvalidConfigurationError extends SimulatorError {
  constructor(message: string) {
    super("invalid-configuration", message);
    this.name = "InvalidConfigurationError";
  }
}

export class MalformedInputError extends SimulatorError {
  constructor(message: string) {
    super("malformed-input", message);
    this.name = "MalformedInputError";
  }
}

// Contract violation: the event loop checks emptiness before dequeuing.
export class EmptyQueueError extends SimulatorError {
  constructor() {
    super("empty-queue", "Attempt to dequeue from an empty admission queue");
    this.name = "EmptyQueueError";
  }
}

export class UnschedulableProcessError extends SimulatorError {
  readonly processId: number;
  readonly pagesNeeded: number;
  readonly frameCount: number;

  constructor(processId: number, pagesNeeded: number, frameCount: number) {
    super(
      "unschedulable-process",
      `Process ${processId} needs ${pagesNeeded} pages but memory has ${frameCount} frames`
    );
    this.name = "UnschedulableProcessError";
    this.processId = processId;
    this.pagesNeeded = pagesNeeded;
    this.frameCount = frameCount;
  }
}

export function isSimulatorError(err: unknown): err is SimulatorError {
  return err instanceof SimulatorError;
}
