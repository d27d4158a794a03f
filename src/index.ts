export {
  createFpGrowth,
  findFrequentPatterns,
  generateAssociationRules,
  type FpGrowth,
  type FpGrowthOptions,
  type Logger,
} from "./api/fpGrowth.js";
export { MiningError, problem, type FieldError, type Problem, type ProblemCode } from "./api/problem.js";
export * from "./core/index.js";
