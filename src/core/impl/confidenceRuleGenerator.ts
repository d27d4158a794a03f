import type { RuleGenerator } from "../rules.js";
import { RuleMap, canonicalItemset, type PatternMap } from "../itemset.js";
import { combinations } from "./combinations.js";

/**
 * Splits each itemset into antecedent/consequent pairs and scores them by
 * confidence = support(itemset) / support(antecedent).
 *
 * Antecedents missing from the pattern map produce no rule.
 */
export class ConfidenceRuleGenerator implements RuleGenerator {
  generate(patterns: PatternMap, minConfidence: number): RuleMap {
    const rules = new RuleMap();

    for (const [itemset, support] of patterns) {
      for (let size = 1; size < itemset.length; size++) {
        for (const subset of combinations(itemset, size)) {
          const antecedent = canonicalItemset(subset);
          const lower = patterns.get(antecedent);
          if (lower === undefined || lower <= 0) continue;

          const confidence = support / lower;
          // NaN never passes
          if (!(confidence >= minConfidence)) continue;

          const taken = new Set(antecedent);
          const consequent = canonicalItemset(itemset.filter((x) => !taken.has(x)));
          rules.addRule(antecedent, { consequent, confidence, support });
        }
      }
    }

    return rules;
  }
}
