import { Result } from "#result";
import type { CheckError } from "#analysis/errors";
import { CheckErrors } from "#analysis/errors";

import { CostFunction, evaluateCost } from "./functions.js";

export const DEFAULT_COST_LIMIT = 100_000;

export interface CostTracker {
  /**
   * Charges `fn` for an input of `inputSize`. The budget is checked after
   * the charge is added, since the charge is only known at this point.
   */
  add(fn: CostFunction, inputSize: number): Result<void, CheckError>;

  /** Total charged so far */
  readonly total: number;
}

export namespace CostTracker {
  export const limited = (limit: number = DEFAULT_COST_LIMIT): CostTracker =>
    new LimitedCostTracker(limit);

  export const unlimited = (): CostTracker =>
    new LimitedCostTracker(Number.POSITIVE_INFINITY);
}

export class LimitedCostTracker implements CostTracker {
  private spent = 0;
  private readonly charges = new Map<CostFunction, number>();

  constructor(public readonly limit: number) {}

  get total(): number {
    return this.spent;
  }

  /**
   * Number of times `fn` has been charged
   */
  count(fn: CostFunction): number {
    return this.charges.get(fn) ?? 0;
  }

  add(fn: CostFunction, inputSize: number): Result<void, CheckError> {
    const cost = evaluateCost(fn, inputSize);
    const total = this.spent + cost;

    if (!Number.isSafeInteger(total)) {
      return Result.err(CheckErrors.costOverflow());
    }

    this.spent = total;
    this.charges.set(fn, this.count(fn) + 1);

    if (total > this.limit) {
      return Result.err(CheckErrors.costBalanceExceeded(total, this.limit));
    }
    return Result.ok(undefined);
  }
}
