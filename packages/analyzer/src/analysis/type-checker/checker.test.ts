import { describe, expect, it } from "vitest";

import { Expression } from "#ast";
import { Result, Severity } from "#result";
import { FunctionType } from "#types";

import "../../../test/matchers.js";

import type { ContractAnalysis } from "../contract-analysis.js";
import { CheckErrorCode } from "../errors.js";
import { checkSource } from "../pipeline.js";

function analyzed(source: string): ContractAnalysis {
  const result = checkSource(source);
  if (!result.success) {
    throw new Error(Result.firstError(result)?.message);
  }
  return result.value;
}

function returnType(analysis: ContractAnalysis, name: string): string {
  const type =
    analysis.getPublicFunctionType(name) ??
    analysis.getReadOnlyFunctionType(name) ??
    analysis.getPrivateFunction(name);
  if (!type || !FunctionType.isFixed(type)) {
    throw new Error(`no function '${name}'`);
  }
  return type.returns.toString();
}

describe("TypeChecker", () => {
  describe("definitions", () => {
    it("records every kind of definition", () => {
      const analysis = analyzed(`
        (define-constant owner tx-sender)
        (define-data-var counter uint u0)
        (define-map balances principal uint)
        (define-fungible-token gold)
        (define-non-fungible-token badge (buff 8))
        (define-private (helper) true)
        (define-read-only (peek) (var-get counter))
        (define-public (bump) (ok u1))
      `);

      expect(analysis.getVariableType("owner")?.toString()).toBe("principal");
      expect(analysis.getPersistedVariableType("counter")?.toString()).toBe(
        "uint",
      );
      expect(analysis.getMapType("balances")?.map(String)).toEqual([
        "principal",
        "uint",
      ]);
      expect(analysis.ftExists("gold")).toBe(true);
      expect(analysis.getNftType("badge")?.toString()).toBe("(buff 8)");
      expect(returnType(analysis, "helper")).toBe("bool");
      expect(returnType(analysis, "peek")).toBe("uint");
      expect(returnType(analysis, "bump")).toBe("(response uint UnknownType)");
    });

    it("checks definitions after the definitions they use", () => {
      const analysis = analyzed(`
        (define-read-only (total) (+ (base) bonus))
        (define-constant bonus u5)
        (define-private (base) u10)
      `);

      expect(returnType(analysis, "total")).toBe("uint");
    });

    it("lets tuple fields share names with definitions", () => {
      const analysis = analyzed(`
        (define-read-only (count) (get count (tuple (count u1))))
        (define-read-only (total)
          (let ((v u1)) (get total (tuple (total v)))))
        (define-read-only (a) (get b (tuple (b u2))))
        (define-read-only (b) (a))
      `);

      expect(returnType(analysis, "count")).toBe("uint");
      expect(returnType(analysis, "total")).toBe("uint");
      expect(returnType(analysis, "b")).toBe("uint");
    });

    it("rejects a second definition of a name", () => {
      const result = checkSource(`
        (define-constant limit u1)
        (define-data-var limit uint u2)
      `);

      expect(result).toHaveMessage({
        severity: Severity.Error,
        code: CheckErrorCode.NAME_ALREADY_USED,
        message: "Defining 'limit' conflicts with previous value",
      });
    });

    it("rejects definitions of language names", () => {
      expect(checkSource("(define-constant tx-sender u1)")).toHaveMessage({
        code: CheckErrorCode.NAME_ALREADY_USED,
      });
      expect(checkSource("(define-private (+) u1)")).toHaveMessage({
        code: CheckErrorCode.NAME_ALREADY_USED,
      });
      expect(
        checkSource("(define-private (f (uint uint)) u1)"),
      ).toHaveMessage({ code: CheckErrorCode.NAME_ALREADY_USED });
    });

    it("requires public functions to return a response", () => {
      const result = checkSource("(define-public (f) u1)");

      expect(result).toHaveMessage({
        code: CheckErrorCode.PUBLIC_FUNCTION_MUST_RETURN_RESPONSE,
        message:
          "Public functions must return an expression of type 'response', " +
          "found 'uint'",
      });
    });

    it("checks initial values against the declared type", () => {
      expect(checkSource("(define-data-var flag bool u1)")).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message: "Expecting expression of type 'bool', found 'uint'",
      });
    });

    it("rejects trait references inside storage types", () => {
      const result = checkSource(`
        (define-trait t ((m () (response bool uint))))
        (define-map refs principal (tuple (target <t>)))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED,
      });
    });

    it("only allows definitions at the top level", () => {
      const result = checkSource(
        "(define-read-only (f) (define-constant x u1))",
      );

      expect(result).toHaveMessage({
        code: CheckErrorCode.BAD_SYNTAX,
        message: "'define-constant' is only allowed at the top level",
      });
    });
  });

  describe("expressions", () => {
    it("reports unresolved names at their location", () => {
      const source = "(define-read-only (f)\n  y)";
      const result = checkSource(source);

      expect(result).toHaveMessage({
        code: CheckErrorCode.UNDEFINED_VARIABLE,
        message: "Use of unresolved variable 'y'",
      });
      expect(Result.firstError(result)?.location).toEqual({
        offset: source.lastIndexOf("y"),
        length: 1,
      });
    });

    it("reports unknown functions", () => {
      expect(checkSource("(define-read-only (f) (foo u1))")).toHaveMessage({
        code: CheckErrorCode.UNKNOWN_FUNCTION,
        message: "Use of unresolved function 'foo'",
      });
    });

    it("joins the branches of if", () => {
      const analysis = analyzed(
        "(define-read-only (f (x bool)) (if x (ok u1) (err u2)))",
      );
      expect(returnType(analysis, "f")).toBe("(response uint uint)");
    });

    it("rejects branches of different types", () => {
      const result = checkSource("(define-read-only (f) (if true u1 1))");

      expect(result).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message: "Expecting expression of type 'uint', found 'int'",
      });
    });

    it("requires a boolean condition", () => {
      expect(checkSource("(define-read-only (f) (if u1 u1 u2))")).toHaveMessage(
        {
          code: CheckErrorCode.TYPE_ERROR,
          message: "Expecting expression of type 'bool', found 'uint'",
        },
      );
    });

    it("binds let variables for the body only", () => {
      const analysis = analyzed(
        "(define-read-only (f) (let ((a u1) (b u2)) (+ a b)))",
      );
      expect(returnType(analysis, "f")).toBe("uint");

      expect(
        checkSource("(define-read-only (f) (let ((a u1) (b a)) b))"),
      ).toHaveMessage({ code: CheckErrorCode.UNDEFINED_VARIABLE });
    });

    it("rejects let bindings that shadow names", () => {
      expect(
        checkSource("(define-read-only (f) (let ((true u1)) u2))"),
      ).toHaveMessage({ code: CheckErrorCode.NAME_ALREADY_USED });
      expect(
        checkSource("(define-read-only (f) (let ((a u1) (a u2)) a))"),
      ).toHaveMessage({
        code: CheckErrorCode.NAME_ALREADY_USED,
        message: "Defining 'a' conflicts with previous value",
      });
    });

    it("types tuples and field access", () => {
      const analysis = analyzed(`
        (define-read-only (pair) (tuple (count u1) (owner tx-sender)))
        (define-read-only (count-of) (get count (pair)))
      `);

      expect(returnType(analysis, "pair")).toBe(
        "(tuple (count uint) (owner principal))",
      );
      expect(returnType(analysis, "count-of")).toBe("uint");
    });

    it("rejects access to missing tuple fields", () => {
      const result = checkSource(
        "(define-read-only (f) (get missing (tuple (a u1))))",
      );

      expect(result).toHaveMessage({
        code: CheckErrorCode.NO_SUCH_TUPLE_FIELD,
        message: "Cannot find field 'missing' in tuple '(tuple (a uint))'",
      });
    });

    it("requires operands of is-eq to share a type", () => {
      const analysis = analyzed(
        "(define-read-only (f) (is-eq none (some u1)))",
      );
      expect(returnType(analysis, "f")).toBe("bool");
      expect(
        checkSource("(define-read-only (f) (is-eq u1 1))"),
      ).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message: "Expecting expression of type 'uint', found 'int'",
      });
    });

    it("checks calls to defined functions", () => {
      const result = checkSource(`
        (define-private (double (x uint)) (* x u2))
        (define-read-only (f) (double 3))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message: "Expecting expression of type 'uint', found 'int'",
      });
      expect(
        checkSource(`
          (define-private (double (x uint)) (* x u2))
          (define-read-only (f) (double u1 u2))
        `),
      ).toHaveMessage({
        code: CheckErrorCode.INCORRECT_ARGUMENT_COUNT,
        message: "Expecting 1 arguments, got 2",
      });
    });

    it("rejects trait references as values", () => {
      expect(checkSource("(define-read-only (f) <t>)")).toHaveMessage({
        code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED,
      });
    });

    describe("trait values", () => {
      const trait = "(define-trait tk ((m () (response bool uint))))";

      it("cannot be returned", () => {
        expect(
          checkSource(`${trait} (define-private (f (t <tk>)) t)`),
        ).toHaveMessage({
          code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED,
          message: "Trait references can only be used as function parameters",
        });
        expect(
          checkSource(`${trait} (define-public (f (t <tk>)) (ok t))`),
        ).toHaveMessage({ code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED });
      });

      it("cannot be wrapped", () => {
        expect(
          checkSource(
            `${trait} (define-private (f (t <tk>)) (begin (some t) true))`,
          ),
        ).toHaveMessage({ code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED });
        expect(
          checkSource(
            `${trait} (define-private (f (t <tk>)) (begin (err t) true))`,
          ),
        ).toHaveMessage({ code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED });
        expect(
          checkSource(
            `${trait} (define-private (f (t <tk>)) (begin (tuple (k t)) true))`,
          ),
        ).toHaveMessage({ code: CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED });
      });

      it("can be bound and passed on", () => {
        const analysis = analyzed(`
          ${trait}
          (define-private (g (t <tk>)) true)
          (define-private (f (t <tk>)) (let ((alias t)) (g alias)))
        `);

        expect(returnType(analysis, "f")).toBe("bool");
      });
    });
  });

  describe("storage", () => {
    it("types reads and writes", () => {
      const analysis = analyzed(`
        (define-data-var counter uint u0)
        (define-map balances principal uint)
        (define-public (bump)
          (begin
            (var-set counter (+ (var-get counter) u1))
            (map-set balances tx-sender (var-get counter))
            (ok (var-get counter))))
        (define-read-only (balance (who principal))
          (map-get? balances who))
      `);

      expect(returnType(analysis, "bump")).toBe("(response uint UnknownType)");
      expect(returnType(analysis, "balance")).toBe("(optional uint)");
    });

    it("rejects undeclared storage", () => {
      expect(
        checkSource("(define-read-only (f) (var-get nope))"),
      ).toHaveMessage({
        code: CheckErrorCode.NO_SUCH_DATA_VARIABLE,
        message: "Use of unresolved persisted variable 'nope'",
      });
      expect(
        checkSource("(define-read-only (f) (map-get? nope u1))"),
      ).toHaveMessage({
        code: CheckErrorCode.NO_SUCH_MAP,
        message: "Use of unresolved map 'nope'",
      });
    });

    it("checks stored values against the declared type", () => {
      const result = checkSource(`
        (define-map balances principal uint)
        (define-public (f) (ok (map-set balances tx-sender true)))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message: "Expecting expression of type 'uint', found 'bool'",
      });
    });
  });

  describe("type map", () => {
    it("records the type of every checked expression by id", () => {
      const analysis = analyzed("(define-constant limit (+ u1 u2))");
      const [definition] = analysis.expressions;
      const items = Expression.matchList(definition) ?? [];
      const sum = items[2];
      const operand = (Expression.matchList(sum) ?? [])[1];

      expect(analysis.typeMap?.get(sum.id)?.toString()).toBe("uint");
      expect(analysis.typeMap?.get(operand.id)?.toString()).toBe("uint");
      expect(analysis.typeMap?.has(definition.id)).toBe(false);
    });
  });
});
