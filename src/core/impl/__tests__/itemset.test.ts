import { describe, expect, it } from "vitest";
import { ItemsetMap, PatternMap, RuleMap, canonicalItemset, compareItemsets } from "../../itemset.js";

describe("canonicalItemset", () => {
  it("dedupes and sorts numbers before strings", () => {
    expect(canonicalItemset(["b", 2, "a", 10, 2])).toEqual([2, 10, "a", "b"]);
  });

  it("orders itemsets element-wise, prefixes first", () => {
    const sets = [[2], [1, 2], [1]];
    expect(sets.sort(compareItemsets)).toEqual([[1], [1, 2], [2]]);
  });
});

describe("ItemsetMap", () => {
  it("addresses entries independently of item order", () => {
    const m = new ItemsetMap<string>();
    m.set([3, 1], "x");
    expect(m.get([1, 3])).toBe("x");
    expect(m.has([1, 3, 1])).toBe(true);
    expect(m.has([1])).toBe(false);
    expect(Array.from(m.entries())).toEqual([[[1, 3], "x"]]);
  });

  it("keeps numeric and string items apart", () => {
    const m = new ItemsetMap<number>();
    m.set([1], 1).set(["1"], 2);
    expect(m.size).toBe(2);
    expect(m.get(["1"])).toBe(2);
  });
});

describe("PatternMap", () => {
  it("adds supports on repeated keys", () => {
    const p = new PatternMap();
    p.add(["a", "b"], 2).add(["b", "a"], 3);
    expect(p.get(["a", "b"])).toBe(5);
  });

  it("lists itemsets in canonical order", () => {
    const p = PatternMap.from([
      [[2], 3],
      [[2, 1], 1],
      [[1], 2],
    ]);
    expect(p.toArray()).toEqual([
      { items: [1], support: 2 },
      { items: [1, 2], support: 1 },
      { items: [2], support: 3 },
    ]);
  });
});

describe("RuleMap", () => {
  it("accumulates rules per antecedent", () => {
    const r = new RuleMap();
    r.addRule([5], { consequent: [2], confidence: 1, support: 2 });
    r.addRule([5], { consequent: [1], confidence: 0.5, support: 1 });

    expect(r.size).toBe(1);
    expect(r.get([5])).toHaveLength(2);
    expect(r.toArray().map((x) => x.consequent)).toEqual([[1], [2]]);
  });
});
