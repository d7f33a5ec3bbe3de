import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { MalformedInputError } from "../core/errors";
import { loadWorkload, parseWorkload } from "./parser";

const fixture = fileURLToPath(new URL("../../fixtures/workload.txt", import.meta.url));

describe("parseWorkload", () => {
  it("should read processes in file order", () => {
    const text = "2\n4 0 10 2 100 250\n9 3 5 1 40\n";
    expect(parseWorkload(text)).toEqual([
      { id: 4, arrivalTime: 0, lifetime: 10, segments: [100, 250] },
      { id: 9, arrivalTime: 3, lifetime: 5, segments: [40] },
    ]);
  });

  it("should accept a zero lifetime", () => {
    expect(parseWorkload("1\n1 0 0 1 100")).toEqual([
      { id: 1, arrivalTime: 0, lifetime: 0, segments: [100] },
    ]);
  });

  it("should accept an empty workload", () => {
    expect(parseWorkload("0")).toEqual([]);
  });

  it.each([
    ["", "unexpected end of input while reading the process count"],
    ["1\n1 0 5", "unexpected end of input while reading process #1 segment count"],
    ["1\n1 0 x 1 100", 'expected an integer for process #1 lifetime, found "x"'],
    ["1\n1 0 5 1 100 9", "unexpected data after 1 processes"],
    ["-1", "process count must not be negative (got -1)"],
    [
      "2\n9007199254740993 0 5 1 100\n9007199254740992 0 5 1 100",
      'integer out of range for process #1 id: "9007199254740993"',
    ],
    ["1\n1 0 5 -1", "process #1: segment count must not be negative (got -1)"],
    ["1\n1 0 5 0", "process #1: segments must not be empty"],
    ["2\n1 0 5 1 100\n1 0 5 1 100", "process #2: id 1 is used more than once"],
  ])("should reject %j", (text, message) => {
    expect(() => parseWorkload(text)).toThrow(MalformedInputError);
    expect(() => parseWorkload(text)).toThrow(message);
  });
});

describe("loadWorkload", () => {
  it("should read a workload file", async () => {
    const processes = await loadWorkload(fixture);
    expect(processes.map((p) => p.id)).toEqual([1, 2, 3]);
    expect(processes[0].segments).toEqual([200, 400]);
    expect(processes[2]).toEqual({ id: 3, arrivalTime: 10, lifetime: 5, segments: [1500] });
  });

  it("should report a missing file as bad input", async () => {
    await expect(loadWorkload("/nonexistent/workload.txt")).rejects.toThrow(
      "cannot read workload file /nonexistent/workload.txt"
    );
  });
});
