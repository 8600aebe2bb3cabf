import { beforeEach, describe, expect, it } from "vitest";

import { Result } from "#result";
import { QualifiedContractIdentifier, TraitIdentifier, Type } from "#types";

import "../../../test/matchers.js";

import {
  ContractAnalysis,
  type TraitDefinition,
} from "../contract-analysis.js";
import { MemoryAnalysisDatabase } from "../database.js";
import { CheckErrorCode } from "../errors.js";
import { analyze } from "../pipeline.js";

const local = QualifiedContractIdentifier.local;

describe("trait definitions", () => {
  let db: MemoryAnalysisDatabase;

  const deploy = (name: string, source: string) => {
    const result = analyze(local(name), source, db, { save: true });
    if (!result.success) {
      throw new Error(Result.firstError(result)?.message);
    }
    return result.value;
  };

  const check = (source: string) => analyze(local("caller"), source, db);

  beforeEach(() => {
    db = new MemoryAnalysisDatabase();
    deploy("defun", "(define-trait token ((name () (response uint uint))))");
  });

  describe("define-trait", () => {
    it("records method signatures", () => {
      const result = check(`
        (define-trait vault (
          (deposit (uint <vault-token>) (response bool uint))
          (total () (response uint uint))))
        (use-trait vault-token .defun.token)
      `);
      if (!result.success) {
        throw new Error(Result.firstError(result)?.message);
      }

      const definition = result.value.getDefinedTrait("vault");
      expect([...(definition?.keys() ?? [])]).toEqual(["deposit", "total"]);
      expect(definition?.get("deposit")?.args.map(String)).toEqual([
        "uint",
        "<vault-token>",
      ]);
    });

    it("rejects duplicate method names", () => {
      const result = check(`
        (define-trait t (
          (m () (response bool uint))
          (m () (response bool uint))))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.DEFINE_TRAIT_DUPLICATE_METHOD,
        message: "Duplicate method name 'm' in trait definition",
      });
    });

    it("rejects a second trait of the same name", () => {
      const result = check(`
        (define-trait t ((m () (response bool uint))))
        (define-trait t ((n () (response bool uint))))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.NAME_ALREADY_USED,
        message: "Defining 't' conflicts with previous value",
      });
    });

    it("rejects references to undeclared traits", () => {
      const result = check(
        "(define-trait t ((m (<nope>) (response bool uint))))",
      );

      expect(result).toHaveMessage({
        code: CheckErrorCode.TRAIT_REFERENCE_UNKNOWN,
        message: "Use of undeclared trait <nope>",
      });
    });

    it("rejects a trait that refers to itself", () => {
      const result = check("(define-trait t ((m (<t>) (response bool uint))))");

      expect(result).toHaveMessage({
        code: CheckErrorCode.CIRCULAR_REFERENCE,
        message: "Detected interdependent functions (t)",
      });
    });

    it("rejects cycles through other contracts", () => {
      const external = new ContractAnalysis(local("external"), []);
      external.addReferencedTrait(
        "back",
        new TraitIdentifier(local("caller"), "tb"),
      );
      const ta: TraitDefinition = new Map([
        [
          "m",
          {
            args: [Type.traitReference("back")],
            returns: Type.response(Type.bool, Type.uint),
          },
        ],
      ]);
      external.addDefinedTrait("ta", ta);
      db.insertContract(external);

      const result = check(`
        (use-trait ta .external.ta)
        (define-trait tb ((m (<ta>) (response bool uint))))
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.CIRCULAR_REFERENCE,
        message: "Detected interdependent functions (tb)",
      });
    });
  });

  describe("use-trait", () => {
    it("binds an alias to the trait's origin", () => {
      const result = check("(use-trait t .defun.token)");
      if (!result.success) {
        throw new Error(Result.firstError(result)?.message);
      }

      expect(result.value.resolveTrait("t")?.toString()).toBe(
        `${local("defun").toString()}.token`,
      );
    });

    it("follows traits another contract imported", () => {
      deploy("relay", "(use-trait relayed .defun.token)");

      const result = check("(use-trait again .relay.relayed)");
      if (!result.success) {
        throw new Error(Result.firstError(result)?.message);
      }
      expect(result.value.resolveTrait("again")?.toString()).toBe(
        `${local("defun").toString()}.token`,
      );
    });

    it("requires the contract to be analyzed", () => {
      expect(check("(use-trait t .nowhere.token)")).toHaveMessage({
        code: CheckErrorCode.NO_SUCH_CONTRACT,
        message: `Use of unresolved contract '${local("nowhere").toString()}'`,
      });
    });

    it("requires the trait to exist", () => {
      expect(check("(use-trait t .defun.ghost)")).toHaveMessage({
        code: CheckErrorCode.TRAIT_REFERENCE_UNKNOWN,
        message: "Use of undeclared trait <ghost>",
      });
    });

    it("rejects an alias already in use", () => {
      const result = check(`
        (define-trait t ((m () (response bool uint))))
        (use-trait t .defun.token)
      `);

      expect(result).toHaveMessage({
        code: CheckErrorCode.NAME_ALREADY_USED,
        message: "Defining 't' conflicts with previous value",
      });
    });

    it("requires a trait identifier", () => {
      expect(check("(use-trait t .defun)")).toHaveMessage({
        code: CheckErrorCode.BAD_SYNTAX,
        message: "Invalid syntax: expected a trait identifier",
      });
    });
  });

  describe("impl-trait", () => {
    it("records the implemented trait", () => {
      const result = check(`
        (impl-trait .defun.token)
        (define-public (name) (ok u1))
      `);
      if (!result.success) {
        throw new Error(Result.firstError(result)?.message);
      }

      expect(result.value.implementedTraits.map(String)).toEqual([
        `${local("defun").toString()}.token`,
      ]);
    });

    it("requires the trait to exist", () => {
      expect(check("(impl-trait .defun.ghost)")).toHaveMessage({
        code: CheckErrorCode.TRAIT_REFERENCE_UNKNOWN,
      });
    });
  });

  it("requires function parameter traits to be declared", () => {
    expect(check("(define-public (f (x <nope>)) (ok u1))")).toHaveMessage({
      code: CheckErrorCode.TRAIT_REFERENCE_UNKNOWN,
      message: "Use of undeclared trait <nope>",
    });
  });
});
