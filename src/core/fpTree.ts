import type { FrequencyTable, Item, WeightedTransaction } from "./types.js";

/** Index of a node inside its tree's arena. The root is always 0. */
export type NodeId = number;

export const ROOT_ID: NodeId = 0;

export interface FpNode {
  readonly id: NodeId;
  /** null only for the root */
  readonly item: Item | null;
  readonly count: number;
  readonly parent: NodeId | undefined;
  /** next node elsewhere in the tree carrying the same item */
  readonly next: NodeId | undefined;
}

/** Suffix item a conditional tree was projected on, with its support. */
export interface FpTreeRoot {
  item: Item;
  count: number;
}

/**
 * Prefix tree of transactions under the canonical item order, plus a header
 * table chaining all occurrences of each item.
 *
 * Trees are immutable once built.
 */
export interface FpTree {
  readonly frequency: FrequencyTable;
  /** set for conditional trees */
  readonly root: FpTreeRoot | undefined;
  /** number of nodes, root excluded */
  readonly size: number;

  /** Frequent items in canonical order (descending count, first-seen tie-break). */
  itemOrder(): Item[];
  node(id: NodeId): FpNode | undefined;
  children(id: NodeId): NodeId[];
  /** Walks the header chain of `item` in insertion order. */
  occurrences(item: Item): Iterable<FpNode>;
  /** Items from the node's parent up to (not including) the root. */
  prefixPath(id: NodeId): Item[];
  hasSinglePath(): boolean;
}

export interface FpTreeBuilder {
  build(transactions: Iterable<WeightedTransaction>, minSupport: number, root?: FpTreeRoot): FpTree;
}
