import { Result } from "#result";
import { Type, type FunctionSignature, type FunctionType } from "#types";

import type { ContractAnalysis } from "../contract-analysis.js";
import type { AnalysisDatabase } from "../database.js";
import { CheckErrors, type CheckError } from "../errors.js";
import type { AnalysisPass } from "../pass.js";

import { loadTrait } from "./lookup.js";

/**
 * Authoritative trait compliance check, run once every function of the
 * contract has its final signature.
 *
 * Each required method must be a public function of fixed arity with the
 * same number of arguments. Ordinary arguments and the return type are
 * compared by admission; trait-typed arguments are compared by identity,
 * each side resolved through its own contract's trait namespace, so two
 * traits with identical methods but different origins never match.
 */
export const postTypeCheckTraitChecker: AnalysisPass = {
  run(
    analysis: ContractAnalysis,
    db: AnalysisDatabase,
  ): Result<void, CheckError> {
    for (const trait of analysis.implementedTraits) {
      const resolved = loadTrait(db, trait);
      if (!resolved.success) {
        return resolved;
      }
      const { definingContract, definition } = resolved.value;

      for (const [method, required] of definition) {
        const realized = analysis.getPublicFunctionType(method);
        const matches =
          realized !== undefined &&
          implementsMethod(required, realized, definingContract, analysis);

        if (!matches) {
          return Result.err(
            CheckErrors.badTraitImplementation(trait.name, method),
          );
        }
      }
    }
    return Result.ok(undefined);
  },
};

function implementsMethod(
  required: FunctionSignature,
  realized: FunctionType,
  definingContract: ContractAnalysis,
  implementingContract: ContractAnalysis,
): boolean {
  if (realized.kind !== "fixed") {
    return false;
  }
  if (realized.args.length !== required.args.length) {
    return false;
  }

  for (let i = 0; i < required.args.length; i++) {
    const expected = required.args[i];
    const actual = realized.args[i].signature;

    if (Type.isTraitReference(expected)) {
      if (!Type.isTraitReference(actual)) {
        return false;
      }
      const expectedTrait = definingContract.resolveTrait(expected.alias);
      const actualTrait = implementingContract.resolveTrait(actual.alias);
      if (
        !expectedTrait ||
        !actualTrait ||
        !expectedTrait.equals(actualTrait)
      ) {
        return false;
      }
    } else if (!expected.admits(actual)) {
      return false;
    }
  }

  return required.returns.admits(realized.returns);
}
