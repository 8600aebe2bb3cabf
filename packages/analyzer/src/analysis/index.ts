/**
 * Static analysis of contracts
 */

export {
  ContractAnalysis,
  type TraitDefinition,
} from "./contract-analysis.js";
export {
  MemoryAnalysisDatabase,
  type AnalysisDatabase,
} from "./database.js";
export * from "./errors.js";
export type { AnalysisPass } from "./pass.js";
export { definitionSorter, sortDefinitions } from "./definition-sorter/index.js";
export * from "./trait-checker/index.js";
export * from "./type-checker/index.js";
export {
  analysisSequence,
  analyze,
  checkSource,
  typeCheck,
  type AnalysisOptions,
  type CheckSourceOptions,
} from "./pipeline.js";
