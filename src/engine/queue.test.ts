import { describe, expect, it } from "vitest";
import { EmptyQueueError } from "../core/errors";
import { createProcess } from "../core/process";
import {
  createQueue,
  dequeue,
  enqueue,
  isEmpty,
  peekFront,
  queueLength,
  queuedIds,
} from "./queue";

const proc = (id: number) =>
  createProcess({ id, arrivalTime: 0, lifetime: 1, segments: [100] });

describe("AdmissionQueue", () => {
  it("should start empty", () => {
    const queue = createQueue();
    expect(isEmpty(queue)).toBe(true);
    expect(peekFront(queue)).toBeUndefined();
    expect(queuedIds(queue)).toEqual([]);
  });

  it("should dequeue in arrival order", () => {
    const queue = createQueue();
    enqueue(queue, proc(3));
    enqueue(queue, proc(1));
    enqueue(queue, proc(2));

    expect(dequeue(queue).id).toBe(3);
    expect(dequeue(queue).id).toBe(1);
    expect(dequeue(queue).id).toBe(2);
    expect(isEmpty(queue)).toBe(true);
  });

  it("should peek without removing", () => {
    const queue = createQueue();
    enqueue(queue, proc(5));
    enqueue(queue, proc(6));

    expect(peekFront(queue)?.id).toBe(5);
    expect(queueLength(queue)).toBe(2);
    expect(queuedIds(queue)).toEqual([5, 6]);
  });

  it("should throw when dequeuing from an empty queue", () => {
    const queue = createQueue();
    expect(() => dequeue(queue)).toThrow(EmptyQueueError);

    enqueue(queue, proc(1));
    dequeue(queue);
    expect(() => dequeue(queue)).toThrow(EmptyQueueError);
  });

  it("should keep order across compaction", () => {
    const queue = createQueue();
    for (let id = 1; id <= 200; id++) enqueue(queue, proc(id));
    for (let i = 0; i < 150; i++) dequeue(queue);

    expect(queueLength(queue)).toBe(50);
    expect(peekFront(queue)?.id).toBe(151);

    enqueue(queue, proc(201));
    const ids = queuedIds(queue);
    expect(ids[0]).toBe(151);
    expect(ids[ids.length - 1]).toBe(201);
    expect(ids).toHaveLength(51);
  });
});
