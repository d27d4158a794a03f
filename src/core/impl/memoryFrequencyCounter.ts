import type { FrequencyTable, Item, WeightedTransaction } from "../types.js";
import type { FrequencyCounter } from "../counter.js";

/**
 * Counts weighted item occurrences with a Map, then drops the infrequent ones.
 * Map insertion order gives first-seen order for free.
 */
export class MemoryFrequencyCounter implements FrequencyCounter {
  count(transactions: Iterable<WeightedTransaction>, minSupport: number): FrequencyTable {
    const counts = new Map<Item, number>();

    for (const tx of transactions) {
      for (const item of tx.items) {
        counts.set(item, (counts.get(item) ?? 0) + tx.count);
      }
    }

    const frequent = new Map<Item, number>();
    for (const [item, n] of counts) {
      if (n >= minSupport) frequent.set(item, n);
    }
    return frequent;
  }
}
