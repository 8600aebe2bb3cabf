import { beforeEach, describe, expect, it } from "vitest";

import { CostFunction, LimitedCostTracker } from "#costs";
import { Result } from "#result";
import {
  FunctionType,
  QualifiedContractIdentifier,
  TRANSIENT_ISSUER,
} from "#types";

import "../../../../test/matchers.js";

import { MemoryAnalysisDatabase } from "../../database.js";
import { CheckErrorCode } from "../../errors.js";
import { analyze } from "../../pipeline.js";

const local = QualifiedContractIdentifier.local;

describe("contract-call?", () => {
  let db: MemoryAnalysisDatabase;

  const deploy = (name: string, source: string) => {
    const result = analyze(local(name), source, db, { save: true });
    if (!result.success) {
      throw new Error(Result.firstError(result)?.message);
    }
    return result.value;
  };

  const check = (source: string, costTracker = new LimitedCostTracker(1000)) =>
    analyze(local("caller"), source, db, { costTracker });

  const returnTypeOf = (source: string, name: string) => {
    const result = check(source);
    if (!result.success) {
      throw new Error(Result.firstError(result)?.message);
    }
    const type =
      result.value.getPublicFunctionType(name) ??
      result.value.getReadOnlyFunctionType(name);
    if (!type || !FunctionType.isFixed(type)) {
      throw new Error(`no function '${name}'`);
    }
    return type.returns.toString();
  };

  beforeEach(() => {
    db = new MemoryAnalysisDatabase();
    deploy(
      "counter",
      `
        (define-public (add (n uint)) (ok n))
        (define-read-only (peek) u1)
        (define-private (secret) u2)
      `,
    );
    deploy(
      "defun",
      `
        (define-trait token ((name () (response uint uint))))
        (define-trait vault ((deposit (<token>) (response bool uint))))
      `,
    );
  });

  describe("to a named contract", () => {
    it("gives the callee's return type", () => {
      const add = "(define-public (f) (contract-call? .counter add u1))";
      const peek = "(define-read-only (g) (contract-call? .counter peek))";

      expect(returnTypeOf(add, "f")).toBe("(response uint UnknownType)");
      expect(returnTypeOf(peek, "g")).toBe("uint");
    });

    it("requires the contract to be analyzed", () => {
      const result = check(
        "(define-public (f) (contract-call? .nowhere add u1))",
      );

      expect(result).toHaveMessage({
        code: CheckErrorCode.NO_SUCH_CONTRACT,
        message: `Use of unresolved contract '${local("nowhere").toString()}'`,
      });
    });

    it("only reaches public and read-only functions", () => {
      const result = check(
        "(define-read-only (f) (contract-call? .counter secret))",
      );

      expect(result).toHaveMessage({
        code: CheckErrorCode.NO_SUCH_PUBLIC_FUNCTION,
        message: `Contract '${local("counter").toString()}' has no public function 'secret'`,
      });
    });

    it("checks arguments against the callee's parameters", () => {
      expect(
        check("(define-public (f) (contract-call? .counter add 1))"),
      ).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message: "Expecting expression of type 'uint', found 'int'",
      });
      expect(
        check("(define-public (f) (contract-call? .counter add))"),
      ).toHaveMessage({
        code: CheckErrorCode.INCORRECT_ARGUMENT_COUNT,
        message: "Expecting 1 arguments, got 0",
      });
    });

    it("resolves trait parameters in the callee's namespace", () => {
      deploy(
        "market",
        `
          (use-trait tk .defun.token)
          (define-public (list-item (item <tk>)) (ok u1))
        `,
      );

      const result = check(`
        (use-trait mine .defun.token)
        (define-public (sell (x <mine>)) (contract-call? .market list-item x))
      `);
      expect(result.success).toBe(true);
    });
  });

  describe("through a trait reference", () => {
    it("gives the method's return type and charges the trait lookup", () => {
      const costTracker = new LimitedCostTracker(1000);
      const result = check(
        `
          (use-trait t .defun.token)
          (define-public (call (target <t>)) (contract-call? target name))
        `,
        costTracker,
      );

      expect(result.success).toBe(true);
      expect(costTracker.count(CostFunction.ANALYSIS_TRAIT_LOOKUP)).toBe(1);
      // lookup of one method: 2 * 1 + 1; function check: (response uint uint)
      expect(costTracker.total).toBe(6);
    });

    it("reaches traits defined in the same contract", () => {
      expect(
        returnTypeOf(
          `
            (define-public (call (target <local-t>))
              (contract-call? target ping))
            (define-trait local-t ((ping () (response bool uint))))
          `,
          "call",
        ),
      ).toBe("(response bool uint)");
    });

    it("rejects methods the trait does not declare", () => {
      const costTracker = new LimitedCostTracker(1000);
      const result = check(
        `
          (use-trait t .defun.token)
          (define-public (call (target <t>)) (contract-call? target burn))
        `,
        costTracker,
      );

      expect(result).toHaveMessage({
        code: CheckErrorCode.TRAIT_METHOD_UNKNOWN,
        message: "Method 'burn' unspecified in trait <token>",
      });
      expect(costTracker.count(CostFunction.ANALYSIS_TRAIT_LOOKUP)).toBe(1);
    });

    it("matches trait arguments by the trait they resolve to", () => {
      const result = check(`
        (use-trait v .defun.vault)
        (use-trait tk .defun.token)
        (define-public (go (target <v>) (asset <tk>))
          (contract-call? target deposit asset))
      `);

      expect(result.success).toBe(true);
    });

    it("rejects a local trait with the same name and methods", () => {
      const result = check(`
        (use-trait v .defun.vault)
        (define-trait token ((name () (response uint uint))))
        (define-public (go (target <v>) (asset <token>))
          (contract-call? target deposit asset))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.TYPE_ERROR,
        message:
          `Expecting expression of type '<token>' (${local("defun").toString()}.token), ` +
          `found '<token>' (${local("caller").toString()}.token)`,
      });
    });
  });

  describe("malformed calls", () => {
    it("requires a contract principal", () => {
      expect(
        check(
          `(define-public (f) (contract-call? '${TRANSIENT_ISSUER} add u1))`,
        ),
      ).toHaveMessage({ code: CheckErrorCode.CONTRACT_CALL_EXPECT_NAME });
      expect(
        check("(define-public (f) (contract-call? tx-sender add u1))"),
      ).toHaveMessage({ code: CheckErrorCode.CONTRACT_CALL_EXPECT_NAME });
    });

    it("requires a function name", () => {
      expect(
        check("(define-public (f) (contract-call? .counter u1))"),
      ).toHaveMessage({
        code: CheckErrorCode.CONTRACT_CALL_EXPECT_NAME,
        message: "Missing contract name for call",
      });
    });
  });
});
