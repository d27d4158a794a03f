import type { Item, WeightedTransaction } from "../core/types.js";
import type { FpTreeBuilder } from "../core/fpTree.js";
import type { PatternMiner } from "../core/miner.js";
import type { RuleGenerator } from "../core/rules.js";
import { PatternMap, type RuleMap } from "../core/itemset.js";
import { ArenaFpTreeBuilder, ConfidenceRuleGenerator, FpGrowthMiner } from "../core/impl/index.js";
import { MiningError, problem, type FieldError } from "./problem.js";
import { asInt, asNumber, isItem, isIterable, pushErr } from "./validation.js";

export type Logger = Pick<Console, "debug">;

export interface FpGrowthOptions {
  builder?: FpTreeBuilder;
  /** defaults to an FP-growth miner sharing `builder` */
  miner?: PatternMiner;
  rules?: RuleGenerator;
  /** receives one summary line per call; silent when omitted */
  logger?: Logger;
}

export interface FpGrowth {
  findFrequentPatterns(transactions: Iterable<Iterable<Item>>, supportThreshold: number): PatternMap;
  generateAssociationRules(patterns: PatternMap, confidenceThreshold: number): RuleMap;
}

export function createFpGrowth(opts: FpGrowthOptions = {}): FpGrowth {
  const builder = opts.builder ?? new ArenaFpTreeBuilder();
  const miner = opts.miner ?? new FpGrowthMiner(builder);
  const rules = opts.rules ?? new ConfidenceRuleGenerator();
  const logger = opts.logger;

  return {
    findFrequentPatterns(transactions, supportThreshold) {
      const minSupport = asInt(supportThreshold);
      if (minSupport === undefined || minSupport < 1) {
        throw invalidArgument("$.supportThreshold", "must be an integer >= 1");
      }

      const db = readTransactions(transactions);
      const tree = builder.build(db, minSupport);
      const patterns = miner.mine(tree, minSupport);

      logger?.debug(
        `fp-growth: ${db.length} transactions, ${tree.frequency.size} frequent items, ` +
          `${tree.size} tree nodes, ${patterns.size} itemsets (minSupport=${minSupport})`,
      );
      return patterns;
    },

    generateAssociationRules(patterns, confidenceThreshold) {
      if (!(patterns instanceof PatternMap)) {
        throw invalidArgument("$.patterns", "must be a PatternMap");
      }
      const errors: FieldError[] = [];
      const minConfidence = asNumber(confidenceThreshold);
      if (minConfidence === undefined || minConfidence < 0) {
        pushErr(errors, "$.confidenceThreshold", "must be a finite number >= 0");
      }
      for (const [items, support] of patterns) {
        const n = asInt(support);
        if (n === undefined || n < 1) pushErr(errors, `$.patterns[${JSON.stringify(items)}]`, "must be an integer >= 1");
      }
      if (minConfidence === undefined || errors.length) {
        throw new MiningError(problem({ code: "INVALID_ARGUMENT", detail: "invalid argument", errors }));
      }

      const out = rules.generate(patterns, minConfidence);
      logger?.debug(`fp-growth: ${out.size} antecedents from ${patterns.size} itemsets (minConfidence=${minConfidence})`);
      return out;
    },
  };
}

const defaultFpGrowth = createFpGrowth();

/** Mines every itemset contained in at least `supportThreshold` transactions. */
export function findFrequentPatterns(
  transactions: Iterable<Iterable<Item>>,
  supportThreshold: number,
  options?: FpGrowthOptions,
): PatternMap {
  return (options ? createFpGrowth(options) : defaultFpGrowth).findFrequentPatterns(transactions, supportThreshold);
}

/** Derives rules whose confidence is at least `confidenceThreshold`; above 1 nothing qualifies. */
export function generateAssociationRules(
  patterns: PatternMap,
  confidenceThreshold: number,
  options?: FpGrowthOptions,
): RuleMap {
  return (options ? createFpGrowth(options) : defaultFpGrowth).generateAssociationRules(patterns, confidenceThreshold);
}

function invalidArgument(path: string, message: string): MiningError {
  return new MiningError(problem({ code: "INVALID_ARGUMENT", detail: "invalid argument", errors: [{ path, message }] }));
}

/**
 * Validates caller transactions and materializes them with weight 1.
 * Repeated items inside one transaction count once (first position kept).
 */
function readTransactions(input: unknown): WeightedTransaction[] {
  const errors: FieldError[] = [];
  const out: WeightedTransaction[] = [];

  if (!isIterable(input)) {
    pushErr(errors, "$.transactions", "must be an iterable of transactions");
  } else {
    let i = 0;
    for (const tx of input) {
      const path = `$.transactions[${i++}]`;
      if (!isIterable(tx)) {
        pushErr(errors, path, "must be an iterable of items");
        continue;
      }

      const items = new Set<Item>();
      let j = 0;
      for (const item of tx) {
        if (isItem(item)) items.add(item);
        else pushErr(errors, `${path}[${j}]`, "must be a string or a finite number");
        j++;
      }
      out.push({ items: Array.from(items), count: 1 });
    }
  }

  if (errors.length) {
    throw new MiningError(problem({ code: "UNPROCESSABLE_ENTITY", detail: "invalid transactions", errors }));
  }
  return out;
}
