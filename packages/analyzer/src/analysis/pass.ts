import type { Result } from "#result";

import type { ContractAnalysis } from "./contract-analysis.js";
import type { AnalysisDatabase } from "./database.js";
import type { CheckError } from "./errors.js";

/**
 * An analysis pass reads, and possibly fills in, one contract's record.
 *
 * Passes are synchronous and run to completion or first failure; the
 * pipeline runs them in a fixed order (see `typeCheck`), and a pass may
 * rely on everything earlier passes have recorded.
 */
export interface AnalysisPass {
  run(
    analysis: ContractAnalysis,
    db: AnalysisDatabase,
  ): Result<void, CheckError>;
}
