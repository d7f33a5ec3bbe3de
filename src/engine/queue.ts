import { EmptyQueueError } from "../core/errors";
import type { Process } from "../core/process";

// Array with a moving head; dequeued slots are reclaimed in bulk.
export type AdmissionQueue = {
  items: Process[];
  head: number;
};

const COMPACT_THRESHOLD = 64;

export function createQueue(): AdmissionQueue {
  return { items: [], head: 0 };
}

export function queueLength(queue: AdmissionQueue): number {
  return queue.items.length - queue.head;
}

export function isEmpty(queue: AdmissionQueue): boolean {
  return queueLength(queue) === 0;
}

export function enqueue(queue: AdmissionQueue, process: Process) {
  queue.items.push(process);
}

export function peekFront(queue: AdmissionQueue): Process | undefined {
  return isEmpty(queue) ? undefined : queue.items[queue.head];
}

export function dequeue(queue: AdmissionQueue): Process {
  if (isEmpty(queue)) {
    throw new EmptyQueueError();
  }

  const front = queue.items[queue.head];
  queue.head++;

  if (queue.head === queue.items.length) {
    queue.items = [];
    queue.head = 0;
  } else if (queue.head >= COMPACT_THRESHOLD && queue.head * 2 >= queue.items.length) {
    queue.items = queue.items.slice(queue.head);
    queue.head = 0;
  }

  return front;
}

export function queuedIds(queue: AdmissionQueue): number[] {
  return queue.items.slice(queue.head).map((p) => p.id);
}
