export { MemoryFrequencyCounter } from "./memoryFrequencyCounter.js";
export { ArenaFpTree, ArenaFpTreeBuilder } from "./arenaFpTree.js";
export { FpGrowthMiner } from "./fpGrowthMiner.js";
export { ConfidenceRuleGenerator } from "./confidenceRuleGenerator.js";
export { combinations, nonEmptySubsets } from "./combinations.js";
