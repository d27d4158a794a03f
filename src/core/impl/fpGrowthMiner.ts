import type { Item, WeightedTransaction } from "../types.js";
import type { FpTree, FpTreeBuilder } from "../fpTree.js";
import type { PatternMiner } from "../miner.js";
import { PatternMap } from "../itemset.js";
import { ArenaFpTreeBuilder } from "./arenaFpTree.js";
import { nonEmptySubsets } from "./combinations.js";

/** A conditional tree waiting to be projected out of `source` on `item`. */
interface Frame {
  source: FpTree;
  item: Item;
  /** suffix of `source` (items of every conditional root above it) */
  suffix: Item[];
}

/**
 * FP-growth over an explicit work stack.
 *
 * Each frame builds one conditional tree when popped, records its patterns
 * and pushes frames for its own items, so depth is bounded by memory rather
 * than the call stack. Frames are pushed most-frequent first, which pops
 * items in ascending frequency.
 */
export class FpGrowthMiner implements PatternMiner {
  constructor(private readonly builder: FpTreeBuilder = new ArenaFpTreeBuilder()) {}

  mine(tree: FpTree, minSupport: number): PatternMap {
    const patterns = new PatternMap();
    const stack: Frame[] = [];

    this.expand(tree, tree.root ? [tree.root.item] : [], patterns, stack);

    for (let frame = stack.pop(); frame; frame = stack.pop()) {
      const conditional = this.project(frame.source, frame.item, minSupport);
      this.expand(conditional, [...frame.suffix, frame.item], patterns, stack);
    }

    return patterns;
  }

  /** Conditional tree of `item`: its prefix paths weighted by occurrence count. */
  private project(source: FpTree, item: Item, minSupport: number): FpTree {
    const base: WeightedTransaction[] = [];
    for (const occ of source.occurrences(item)) {
      const path = source.prefixPath(occ.id);
      if (path.length) base.push({ items: path, count: occ.count });
    }

    return this.builder.build(base, minSupport, { item, count: source.frequency.get(item) ?? 0 });
  }

  private expand(tree: FpTree, suffix: Item[], patterns: PatternMap, stack: Frame[]): void {
    if (tree.root) patterns.add(suffix, tree.root.count);

    if (tree.hasSinglePath()) {
      for (const subset of nonEmptySubsets(tree.itemOrder())) {
        let support = Infinity;
        for (const item of subset) support = Math.min(support, tree.frequency.get(item) ?? 0);
        patterns.add([...subset, ...suffix], support);
      }
      return;
    }

    for (const item of tree.itemOrder()) stack.push({ source: tree, item, suffix });
  }
}
