/** Shared core types used by module contracts. */

/** An atomic transaction element. Compared by equality only. */
export type Item = string | number;

/** One transaction as supplied by the caller. */
export type Transaction = readonly Item[];

/** Canonical itemset: deduplicated and sorted by `compareItems`. */
export type Itemset = readonly Item[];

/** A transaction counted `count` times (conditional pattern bases use this). */
export interface WeightedTransaction {
  items: readonly Item[];
  count: number;
}

/**
 * Item -> occurrence count for one tree.
 * Every key has count >= the threshold the table was built with.
 * Iteration order is first-seen order of the scan.
 */
export type FrequencyTable = ReadonlyMap<Item, number>;

export interface FrequentItemset {
  items: Itemset;
  support: number;
}

export interface RuleConsequent {
  consequent: Itemset;
  confidence: number;
  /** support of antecedent ∪ consequent */
  support: number;
}

export interface AssociationRule extends RuleConsequent {
  antecedent: Itemset;
}
