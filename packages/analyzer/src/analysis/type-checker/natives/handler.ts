import type { Expression } from "#ast";
import type { Result } from "#result";
import type { Type } from "#types";

import type { CheckError } from "../../errors.js";
import type { TypeChecker } from "../checker.js";
import type { TypingContext } from "../context.js";

/**
 * Checks a call to a form whose arguments are not simply typed in order:
 * forms that bind names, take names of storage or assets, or reach other
 * contracts.
 *
 * Receives the unevaluated argument expressions (the call's head is
 * already stripped) and gives the type of the call.
 */
export type SpecialHandler = (
  checker: TypeChecker,
  args: Expression[],
  context: TypingContext,
) => Result<Type, CheckError>;
