import type { FrequencyTable, WeightedTransaction } from "./types.js";

/**
 * Single scan over a transaction collection.
 *
 * Contract notes:
 * - pure: same input, same table (including iteration order)
 * - only items whose weighted count reaches `minSupport` are kept
 */
export interface FrequencyCounter {
  count(transactions: Iterable<WeightedTransaction>, minSupport: number): FrequencyTable;
}
