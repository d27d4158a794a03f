import type { AssociationRule, FrequentItemset, Item, Itemset, RuleConsequent } from "./types.js";

/** Total order over items: numbers first (ascending), then strings. */
export function compareItems(a: Item, b: Item): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Element-wise comparison; a proper prefix sorts first. */
export function compareItemsets(a: Itemset, b: Itemset): number {
  for (let i = 0; i < a.length && i < b.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x === undefined || y === undefined) break;
    const c = compareItems(x, y);
    if (c !== 0) return c;
  }
  return a.length - b.length;
}

export function canonicalItemset(items: Iterable<Item>): Itemset {
  return Array.from(new Set(items)).sort(compareItems);
}

// JSON keeps 1 and "1" apart
function keyOf(itemset: Itemset): string {
  return JSON.stringify(itemset);
}

/**
 * Map keyed by itemsets, order-independent.
 *
 * Keys are canonicalized on every access, so `[2, 1]` and `[1, 2, 1]` address
 * the same entry. Iteration follows insertion order.
 */
export class ItemsetMap<V> {
  private readonly entriesByKey = new Map<string, { items: Itemset; value: V }>();

  get size(): number {
    return this.entriesByKey.size;
  }

  get(items: Iterable<Item>): V | undefined {
    return this.entriesByKey.get(keyOf(canonicalItemset(items)))?.value;
  }

  has(items: Iterable<Item>): boolean {
    return this.entriesByKey.has(keyOf(canonicalItemset(items)));
  }

  set(items: Iterable<Item>, value: V): this {
    const canonical = canonicalItemset(items);
    this.entriesByKey.set(keyOf(canonical), { items: canonical, value });
    return this;
  }

  /** Stores `value`, or `combine(existing, value)` if the key is taken. */
  merge(items: Iterable<Item>, value: V, combine: (existing: V, incoming: V) => V): this {
    const canonical = canonicalItemset(items);
    const key = keyOf(canonical);
    const prev = this.entriesByKey.get(key);
    this.entriesByKey.set(key, { items: canonical, value: prev ? combine(prev.value, value) : value });
    return this;
  }

  *entries(): IterableIterator<[Itemset, V]> {
    for (const { items, value } of this.entriesByKey.values()) yield [items, value];
  }

  [Symbol.iterator](): IterableIterator<[Itemset, V]> {
    return this.entries();
  }
}

/** Itemset -> support count. */
export class PatternMap extends ItemsetMap<number> {
  static from(entries: Iterable<readonly [Iterable<Item>, number]>): PatternMap {
    const out = new PatternMap();
    for (const [items, support] of entries) out.set(items, support);
    return out;
  }

  /** Adds `support` to the itemset's count, inserting it when absent. */
  add(items: Iterable<Item>, support: number): this {
    return this.merge(items, support, (a, b) => a + b);
  }

  toArray(): FrequentItemset[] {
    const out: FrequentItemset[] = [];
    for (const [items, support] of this) out.push({ items, support });
    return out.sort((a, b) => compareItemsets(a.items, b.items));
  }
}

/** Antecedent -> rules sharing it. */
export class RuleMap extends ItemsetMap<RuleConsequent[]> {
  addRule(antecedent: Iterable<Item>, rule: RuleConsequent): this {
    return this.merge(antecedent, [rule], (a, b) => a.concat(b));
  }

  /** Flat listing sorted by antecedent, then consequent. */
  toArray(): AssociationRule[] {
    const out: AssociationRule[] = [];
    for (const [antecedent, rules] of this) {
      for (const r of rules) out.push({ antecedent, ...r });
    }
    return out.sort(
      (a, b) => compareItemsets(a.antecedent, b.antecedent) || compareItemsets(a.consequent, b.consequent),
    );
  }
}
