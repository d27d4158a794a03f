import { describe, expect, it } from "vitest";
import { MemoryFrequencyCounter } from "../memoryFrequencyCounter.js";

describe("MemoryFrequencyCounter", () => {
  it("sums weights and drops items below the threshold", () => {
    const table = new MemoryFrequencyCounter().count(
      [
        { items: ["b", "a"], count: 1 },
        { items: ["a", "c"], count: 2 },
      ],
      2,
    );

    expect(Array.from(table.entries())).toEqual([
      ["a", 3],
      ["c", 2],
    ]);
  });

  it("keeps first-seen order regardless of counts", () => {
    const table = new MemoryFrequencyCounter().count(
      [
        { items: [3], count: 1 },
        { items: [1, 2], count: 1 },
        { items: [1, 2], count: 1 },
      ],
      1,
    );
    expect(Array.from(table.keys())).toEqual([3, 1, 2]);
  });

  it("treats 1 and \"1\" as different items", () => {
    const table = new MemoryFrequencyCounter().count([{ items: [1, "1"], count: 1 }], 1);
    expect(table.size).toBe(2);
  });

  it("returns an empty table for no transactions", () => {
    expect(new MemoryFrequencyCounter().count([], 1).size).toBe(0);
  });
});
