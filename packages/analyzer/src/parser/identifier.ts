/**
 * Assigns every expression its positional id
 */

import type { Expression } from "#ast";
import { Result } from "#result";

import { ParseError, ParseErrorCode } from "./errors.js";

export const MAX_EXPRESSIONS = 1_000_000;

/**
 * Numbers expressions depth-first in pre-order, starting at 1: a list
 * receives its id before its children. Type maps and definition sorting
 * refer to expressions by these ids.
 */
export function identify(
  expressions: Expression[],
  limit: number = MAX_EXPRESSIONS,
): Result<void, ParseError> {
  let next = 1;
  const pending: Expression[] = [...expressions].reverse();

  while (pending.length > 0) {
    const expression = pending.pop();
    if (!expression) {
      break;
    }
    if (next > limit) {
      return Result.err(
        new ParseError(
          ParseErrorCode.TOO_MANY_EXPRESSIONS,
          `limit is ${limit}`,
          expression.loc ?? undefined,
        ),
      );
    }
    expression.id = next++;
    if (expression.kind === "list") {
      for (let i = expression.items.length - 1; i >= 0; i--) {
        pending.push(expression.items[i]);
      }
    }
  }

  return Result.ok(undefined);
}
