export type * from "./types.js";
export type { FrequencyCounter } from "./counter.js";
export { ROOT_ID, type FpNode, type FpTree, type FpTreeBuilder, type FpTreeRoot, type NodeId } from "./fpTree.js";
export type { PatternMiner } from "./miner.js";
export type { RuleGenerator } from "./rules.js";
export { ItemsetMap, PatternMap, RuleMap, canonicalItemset, compareItems, compareItemsets } from "./itemset.js";
export * from "./impl/index.js";
