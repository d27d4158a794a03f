import type { PatternMap, RuleMap } from "./itemset.js";

export interface RuleGenerator {
  /** Keeps antecedent -> consequent splits whose confidence is >= `minConfidence`. */
  generate(patterns: PatternMap, minConfidence: number): RuleMap;
}
