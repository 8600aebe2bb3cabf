/**
 * Contract analysis from source to a checked record
 */

import type { Expression } from "#ast";
import { CostTracker } from "#costs";
import type { AnalysisError } from "#errors";
import { parse } from "#parser";
import { Result } from "#result";
import { QualifiedContractIdentifier } from "#types";

import { ContractAnalysis } from "./contract-analysis.js";
import { MemoryAnalysisDatabase, type AnalysisDatabase } from "./database.js";
import { definitionSorter } from "./definition-sorter/index.js";
import type { CheckError } from "./errors.js";
import type { AnalysisPass } from "./pass.js";
import {
  postTypeCheckTraitChecker,
  traitChecker,
} from "./trait-checker/index.js";
import { createTypeCheckerPass } from "./type-checker/index.js";

export interface AnalysisOptions {
  /** Analysis cost budget; ignored when `costTracker` is given */
  costLimit?: number;

  /** Tracker to charge, e.g. to share one budget between contracts */
  costTracker?: CostTracker;

  /** Store the record in the database when every pass succeeds */
  save?: boolean;
}

/**
 * Passes in the order they must run: the trait passes read declarations
 * only the type checker records, and the type checker relies on the
 * definition order the sorter leaves in the record.
 */
export const analysisSequence = (
  costTracker: CostTracker,
): readonly AnalysisPass[] => [
  definitionSorter,
  createTypeCheckerPass(costTracker),
  traitChecker,
  postTypeCheckTraitChecker,
];

/**
 * Runs every analysis pass over a parsed contract
 */
export function typeCheck(
  contractIdentifier: QualifiedContractIdentifier,
  expressions: Expression[],
  db: AnalysisDatabase,
  options: AnalysisOptions = {},
): Result<ContractAnalysis, CheckError> {
  const analysis = new ContractAnalysis(contractIdentifier, expressions);
  const costTracker =
    options.costTracker ?? CostTracker.limited(options.costLimit);

  for (const pass of analysisSequence(costTracker)) {
    const result = pass.run(analysis, db);
    if (!result.success) {
      return result;
    }
  }

  if (options.save) {
    const saved = db.insertContract(analysis);
    if (!saved.success) {
      return saved;
    }
  }
  return Result.ok(analysis);
}

/**
 * Parses and analyzes contract source. Shorthand contract principals
 * (`.name`) resolve against the contract's own issuer.
 */
export function analyze(
  contractIdentifier: QualifiedContractIdentifier,
  source: string,
  db: AnalysisDatabase,
  options: AnalysisOptions = {},
): Result<ContractAnalysis, AnalysisError> {
  const expressions = parse(source, { issuer: contractIdentifier.issuer });
  if (!expressions.success) {
    return expressions;
  }
  return typeCheck(contractIdentifier, expressions.value, db, options);
}

export interface CheckSourceOptions extends AnalysisOptions {
  /** Contract name, under the transient issuer */
  name?: string;
}

/**
 * Analyzes a single contract on its own, against an empty database
 */
export function checkSource(
  source: string,
  options: CheckSourceOptions = {},
): Result<ContractAnalysis, AnalysisError> {
  const { name = "contract", ...analysisOptions } = options;
  return analyze(
    QualifiedContractIdentifier.local(name),
    source,
    new MemoryAnalysisDatabase(),
    analysisOptions,
  );
}
