import { Result } from "#result";
import type { TraitIdentifier } from "#types";

import type {
  ContractAnalysis,
  TraitDefinition,
} from "../contract-analysis.js";
import type { AnalysisDatabase } from "../database.js";
import { CheckErrors, type CheckError } from "../errors.js";

export interface ResolvedTrait {
  /** Record of the contract that defines the trait */
  definingContract: ContractAnalysis;
  definition: TraitDefinition;
}

/**
 * Loads the definition of an implemented trait from the contract that
 * declares it
 */
export function loadTrait(
  db: AnalysisDatabase,
  trait: TraitIdentifier,
): Result<ResolvedTrait, CheckError> {
  const definingContract = db.loadContract(trait.contractIdentifier);
  if (!definingContract) {
    return Result.err(CheckErrors.traitReferenceUnknown(trait.name));
  }

  const definition = definingContract.getDefinedTrait(trait.name);
  if (!definition) {
    return Result.err(CheckErrors.traitReferenceUnknown(trait.name));
  }

  return Result.ok({ definingContract, definition });
}
