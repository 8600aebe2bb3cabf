import { describe, expect, it } from "vitest";

import type { Expression } from "#ast";
import { parse } from "#parser";
import { Result } from "#result";
import { QualifiedContractIdentifier } from "#types";

import { ContractAnalysis } from "../contract-analysis.js";
import { MemoryAnalysisDatabase } from "../database.js";
import { CheckErrorCode } from "../errors.js";

import { definitionSorter, sortDefinitions } from "./sorter.js";

function parsed(source: string): Expression[] {
  const result = parse(source);
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

function order(source: string): number[] {
  const result = sortDefinitions(parsed(source));
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

describe("sortDefinitions", () => {
  it("keeps source order without dependencies", () => {
    expect(
      order(`
        (define-constant a u1)
        (define-constant b u2)
        (define-constant c u3)
      `),
    ).toEqual([0, 1, 2]);
  });

  it("moves definitions before their uses", () => {
    expect(
      order("(define-read-only (f) (g)) (define-private (g) u1)"),
    ).toEqual([1, 0]);
    expect(order("(f) (define-private (f) u1)")).toEqual([1, 0]);
  });

  it("follows dependencies transitively", () => {
    expect(
      order(`
        (define-read-only (a) (b))
        (define-read-only (b) c)
        (define-constant c u1)
      `),
    ).toEqual([2, 1, 0]);
  });

  it("places use-trait and impl-trait first", () => {
    expect(
      order("(define-constant a u1) (use-trait t .x.y) (impl-trait .x.y)"),
    ).toEqual([1, 2, 0]);
  });

  it("resolves trait references among traits only", () => {
    expect(
      order(`
        (define-private (f (x <t>)) true)
        (define-trait t ((f () (response bool uint))))
      `),
    ).toEqual([1, 0]);
  });

  it("uses the first definition of a name", () => {
    expect(
      order(`
        (define-read-only (a) b)
        (define-constant b u1)
        (define-constant b u2)
      `),
    ).toEqual([1, 0, 2]);
  });

  it("ignores tuple keys and get fields", () => {
    expect(
      order("(define-read-only (count) (get count (tuple (count u1))))"),
    ).toEqual([0]);
    expect(
      order(`
        (define-read-only (a) (tuple (b u1)))
        (define-read-only (b) (a))
      `),
    ).toEqual([0, 1]);
  });

  it("follows tuple values", () => {
    expect(
      order(`
        (define-read-only (a) (tuple (k b)))
        (define-constant b u1)
      `),
    ).toEqual([1, 0]);
  });

  it("ignores let binding names but follows their values", () => {
    expect(
      order(`
        (define-read-only (a) (let ((b c)) u1))
        (define-read-only (b) (a))
        (define-constant c u1)
      `),
    ).toEqual([2, 0, 1]);
  });

  it("ignores parameter names", () => {
    expect(order("(define-private (f (f uint)) u1)")).toEqual([0]);
  });

  it("ignores the function named by contract-call?", () => {
    expect(
      order("(define-public (add (n uint)) (contract-call? .other add n))"),
    ).toEqual([0]);
  });

  it("reports recursion", () => {
    const result = sortDefinitions(parsed("(define-private (f) (f))"));

    expect(Result.firstError(result)?.code).toBe(
      CheckErrorCode.CIRCULAR_REFERENCE,
    );
    expect(Result.firstError(result)?.message).toBe(
      "Detected interdependent functions (f)",
    );
  });

  it("names every definition on a cycle", () => {
    const result = sortDefinitions(
      parsed(`
        (define-constant unrelated u0)
        (define-private (a) (b))
        (define-private (b) (c))
        (define-private (c) (a))
      `),
    );

    expect(Result.firstError(result)?.message).toBe(
      "Detected interdependent functions (a, b, c)",
    );
  });
});

describe("definitionSorter", () => {
  it("records the order in the analysis", () => {
    const analysis = new ContractAnalysis(
      QualifiedContractIdentifier.local("sorted"),
      parsed("(define-read-only (f) x) (define-constant x u1)"),
    );

    const result = definitionSorter.run(analysis, new MemoryAnalysisDatabase());

    expect(result.success).toBe(true);
    expect(analysis.topLevelExpressionSorting).toEqual([1, 0]);
  });
});
