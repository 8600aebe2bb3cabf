/**
 * Cost functions charged during analysis
 */

export enum CostFunction {
  ANALYSIS_TYPE_LOOKUP = "analysis-type-lookup",
  ANALYSIS_TYPE_CHECK = "analysis-type-check",
  ANALYSIS_TRAIT_LOOKUP = "analysis-trait-lookup",
}

/** Cost of `a * n + b` for an input of size `n` */
export interface LinearCost {
  a: number;
  b: number;
}

export const costFunctions: Record<CostFunction, LinearCost> = {
  [CostFunction.ANALYSIS_TYPE_LOOKUP]: { a: 1, b: 1 },
  [CostFunction.ANALYSIS_TYPE_CHECK]: { a: 1, b: 0 },
  [CostFunction.ANALYSIS_TRAIT_LOOKUP]: { a: 2, b: 1 },
};

export function evaluateCost(fn: CostFunction, input: number): number {
  const { a, b } = costFunctions[fn];
  return a * input + b;
}
