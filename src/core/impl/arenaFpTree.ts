import type { FrequencyTable, Item, WeightedTransaction } from "../types.js";
import type { FrequencyCounter } from "../counter.js";
import { ROOT_ID, type FpNode, type FpTree, type FpTreeBuilder, type FpTreeRoot, type NodeId } from "../fpTree.js";
import { MemoryFrequencyCounter } from "./memoryFrequencyCounter.js";

type Node = {
  id: NodeId;
  item: Item | null;
  count: number;
  parent: NodeId | undefined;
  next: NodeId | undefined;
  children: Map<Item, NodeId>;
};

function makeNode(id: NodeId, item: Item | null, count: number, parent: NodeId | undefined): Node {
  return { id, item, count, parent, next: undefined, children: new Map() };
}

/**
 * Canonical order: descending count, ties by first-seen position in the
 * frequency scan. Returns item -> rank (0 = most frequent).
 */
function rankItems(frequency: FrequencyTable): Map<Item, number> {
  const seen = Array.from(frequency.entries(), ([item, count], firstSeen) => ({ item, count, firstSeen }));
  seen.sort((a, b) => b.count - a.count || a.firstSeen - b.firstSeen);

  const ranks = new Map<Item, number>();
  seen.forEach((e, rank) => ranks.set(e.item, rank));
  return ranks;
}

/**
 * FP-tree whose nodes live in one array and point at each other by index.
 *
 * Data structure:
 * - nodes[0] is the root (no item; count is the conditional root count, or 0)
 * - children: item -> child id, so each node has at most one child per item
 * - header: item -> first node carrying it; `next` links the rest
 */
export class ArenaFpTree implements FpTree {
  private readonly rootNode: Node;
  private readonly nodes: Node[];
  private readonly header = new Map<Item, NodeId>();
  private readonly ranks: Map<Item, number>;

  constructor(
    readonly frequency: FrequencyTable,
    readonly root: FpTreeRoot | undefined,
  ) {
    this.rootNode = makeNode(ROOT_ID, null, root?.count ?? 0, undefined);
    this.nodes = [this.rootNode];
    this.ranks = rankItems(frequency);
  }

  get size(): number {
    return this.nodes.length - 1;
  }

  itemOrder(): Item[] {
    return Array.from(this.ranks.keys());
  }

  /** Filters to frequent items and sorts them into canonical order. */
  canonicalize(items: readonly Item[]): Item[] {
    const kept: Array<{ item: Item; rank: number }> = [];
    for (const item of items) {
      const rank = this.ranks.get(item);
      if (rank !== undefined) kept.push({ item, rank });
    }
    kept.sort((a, b) => a.rank - b.rank);
    return kept.map((k) => k.item);
  }

  /**
   * Inserts an already canonical item sequence `weight` times.
   * `tails` tracks the last node of each occurrence chain and only lives as
   * long as the build that owns it.
   */
  insert(path: readonly Item[], weight: number, tails: Map<Item, NodeId>): void {
    let cur = this.rootNode;

    for (const item of path) {
      const childId = cur.children.get(item);
      let child = childId === undefined ? undefined : this.nodes[childId];

      if (child) {
        child.count += weight;
      } else {
        child = makeNode(this.nodes.length, item, weight, cur.id);
        this.nodes.push(child);
        cur.children.set(item, child.id);
        this.link(child, tails);
      }

      cur = child;
    }
  }

  node(id: NodeId): FpNode | undefined {
    return this.nodes[id];
  }

  children(id: NodeId): NodeId[] {
    const n = this.nodes[id];
    return n ? Array.from(n.children.values()) : [];
  }

  *occurrences(item: Item): Iterable<FpNode> {
    let id = this.header.get(item);
    while (id !== undefined) {
      const n = this.nodes[id];
      if (!n) return;
      yield n;
      id = n.next;
    }
  }

  prefixPath(id: NodeId): Item[] {
    const path: Item[] = [];
    let cur = this.nodes[this.nodes[id]?.parent ?? ROOT_ID];
    while (cur && cur.item !== null) {
      path.push(cur.item);
      cur = cur.parent === undefined ? undefined : this.nodes[cur.parent];
    }
    return path;
  }

  hasSinglePath(): boolean {
    let cur: Node | undefined = this.rootNode;
    while (cur) {
      if (cur.children.size > 1) return false;
      const [only] = cur.children.values();
      cur = only === undefined ? undefined : this.nodes[only];
    }
    return true;
  }

  // append to the end of the item's occurrence chain
  private link(n: Node, tails: Map<Item, NodeId>): void {
    if (n.item === null) return;
    const tail = tails.get(n.item);
    const tailNode = tail === undefined ? undefined : this.nodes[tail];
    if (tailNode) {
      tailNode.next = n.id;
    } else {
      this.header.set(n.item, n.id);
    }
    tails.set(n.item, n.id);
  }
}

export class ArenaFpTreeBuilder implements FpTreeBuilder {
  constructor(private readonly counter: FrequencyCounter = new MemoryFrequencyCounter()) {}

  build(transactions: Iterable<WeightedTransaction>, minSupport: number, root?: FpTreeRoot): ArenaFpTree {
    // two passes: counting, then insertion
    const db = Array.from(transactions);

    const tree = new ArenaFpTree(this.counter.count(db, minSupport), root);
    const tails = new Map<Item, NodeId>();
    for (const tx of db) {
      const path = tree.canonicalize(tx.items);
      if (path.length) tree.insert(path, tx.count, tails);
    }
    return tree;
  }
}
