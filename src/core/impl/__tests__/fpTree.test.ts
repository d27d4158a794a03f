import { describe, expect, it } from "vitest";
import { ArenaFpTreeBuilder } from "../arenaFpTree.js";
import { ROOT_ID } from "../../fpTree.js";
import type { Item } from "../../types.js";

function weighted(txs: Item[][]) {
  return txs.map((items) => ({ items, count: 1 }));
}

describe("ArenaFpTreeBuilder", () => {
  const builder = new ArenaFpTreeBuilder();
  const tree = builder.build(
    weighted([
      [1, 3, 4],
      [2, 3, 5],
      [1, 2, 3, 5],
      [2, 5],
    ]),
    2,
  );

  it("orders items by descending count, first-seen on ties", () => {
    // 3, 2 and 5 all occur three times; 3 was seen first
    expect(tree.itemOrder()).toEqual([3, 2, 5, 1]);
    expect(tree.frequency.has(4)).toBe(false);
  });

  it("shares prefixes between transactions", () => {
    expect(tree.size).toBe(7);
    expect(tree.children(ROOT_ID).map((id) => tree.node(id)?.item)).toEqual([3, 2]);

    const [first] = tree.children(ROOT_ID);
    expect(first === undefined ? undefined : tree.node(first)?.count).toBe(3);
  });

  it("chains occurrences of an item in insertion order", () => {
    const fives = Array.from(tree.occurrences(5));
    expect(fives.map((n) => n.count)).toEqual([2, 1]);
    expect(fives.map((n) => tree.prefixPath(n.id))).toEqual([[2, 3], [2]]);

    const ones = Array.from(tree.occurrences(1));
    expect(ones.map((n) => tree.prefixPath(n.id))).toEqual([[3], [5, 2, 3]]);
    expect(Array.from(tree.occurrences(4))).toEqual([]);
  });

  it("detects branching", () => {
    expect(tree.hasSinglePath()).toBe(false);
    expect(tree.root).toBeUndefined();
  });

  it("accumulates weights along a single path", () => {
    const t = builder.build(
      [
        { items: ["a", "b"], count: 2 },
        { items: ["a"], count: 1 },
      ],
      1,
    );

    expect(t.hasSinglePath()).toBe(true);
    expect(t.size).toBe(2);
    expect(Array.from(t.occurrences("a")).map((n) => n.count)).toEqual([3]);
    expect(Array.from(t.occurrences("b")).map((n) => n.count)).toEqual([2]);
  });

  it("breaks frequency ties the same way in every transaction", () => {
    const t = builder.build(weighted([["y", "x"], ["x", "y"]]), 1);
    expect(t.itemOrder()).toEqual(["y", "x"]);
    expect(t.size).toBe(2);
  });

  it("starts fresh occurrence chains for every tree it builds", () => {
    const txs = weighted([
      ["a", "c"],
      ["b", "c"],
      ["a", "b", "c"],
    ]);
    builder.build(txs, 1);
    const t = builder.build(txs, 1);

    expect(t.itemOrder()).toEqual(["c", "a", "b"]);
    const bs = Array.from(t.occurrences("b"));
    expect(bs.map((n) => t.prefixPath(n.id))).toEqual([["c"], ["a", "c"]]);
    expect(Array.from(t.occurrences("c")).map((n) => n.count)).toEqual([3]);
  });

  it("carries the conditional root", () => {
    const t = builder.build([], 2, { item: "x", count: 5 });
    expect(t.root).toEqual({ item: "x", count: 5 });
    expect(t.node(ROOT_ID)).toMatchObject({ item: null, count: 5 });
    expect(t.size).toBe(0);
    expect(t.hasSinglePath()).toBe(true);
  });

  it("skips transactions with no frequent item", () => {
    const t = builder.build(weighted([["a"], ["b"], ["a"]]), 2);
    expect(t.size).toBe(1);
    expect(t.prefixPath(ROOT_ID)).toEqual([]);
  });
});
