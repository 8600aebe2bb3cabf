import { Result } from "#result";

import type { ContractAnalysis } from "../contract-analysis.js";
import type { AnalysisDatabase } from "../database.js";
import type { CheckError } from "../errors.js";
import type { AnalysisPass } from "../pass.js";

import { loadTrait } from "./lookup.js";

/**
 * Confirms that every trait a contract claims to implement exists in its
 * declaring contract, then runs the record's structural compliance check
 */
export const traitChecker: AnalysisPass = {
  run(
    analysis: ContractAnalysis,
    db: AnalysisDatabase,
  ): Result<void, CheckError> {
    for (const trait of analysis.implementedTraits) {
      const resolved = loadTrait(db, trait);
      if (!resolved.success) {
        return resolved;
      }

      const compliance = analysis.checkTraitCompliance(
        trait,
        resolved.value.definition,
      );
      if (!compliance.success) {
        return compliance;
      }
    }
    return Result.ok(undefined);
  },
};
