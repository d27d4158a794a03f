import type { FpTree } from "./fpTree.js";
import type { PatternMap } from "./itemset.js";

/**
 * Mines every frequent itemset out of a built tree.
 *
 * `minSupport` must be the threshold the tree was built with; conditional
 * trees are built with the same one.
 */
export interface PatternMiner {
  mine(tree: FpTree, minSupport: number): PatternMap;
}
