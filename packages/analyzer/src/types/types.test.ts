import { describe, expect, it } from "vitest";

import {
  FunctionType,
  QualifiedContractIdentifier,
  TraitIdentifier,
  TRANSIENT_ISSUER,
  Type,
} from "./index.js";

describe("Type.admits", () => {
  it("compares atomic types by kind", () => {
    expect(Type.uint.admits(Type.uint)).toBe(true);
    expect(Type.uint.admits(Type.int)).toBe(false);
    expect(Type.noType.admits(Type.noType)).toBe(false);
  });

  it("admits shorter buffers", () => {
    expect(Type.buffer(32).admits(Type.buffer(20))).toBe(true);
    expect(Type.buffer(20).admits(Type.buffer(32))).toBe(false);
  });

  it("admits none into any optional", () => {
    expect(
      Type.optional(Type.uint).admits(Type.optional(Type.noType)),
    ).toBe(true);
    expect(Type.optional(Type.uint).admits(Type.optional(Type.int))).toBe(
      false,
    );
  });

  it("admits responses with one unknown side", () => {
    const expected = Type.response(Type.uint, Type.uint);

    expect(expected.admits(Type.response(Type.uint, Type.noType))).toBe(true);
    expect(expected.admits(Type.response(Type.noType, Type.uint))).toBe(true);
    expect(expected.admits(Type.response(Type.noType, Type.noType))).toBe(
      false,
    );
    expect(expected.admits(Type.response(Type.bool, Type.noType))).toBe(
      false,
    );
  });

  it("admits shorter lists and the empty list", () => {
    const expected = Type.list(Type.uint, 5);

    expect(expected.admits(Type.list(Type.uint, 3))).toBe(true);
    expect(expected.admits(Type.list(Type.uint, 6))).toBe(false);
    expect(expected.admits(Type.list(Type.noType, 0))).toBe(true);
  });

  it("compares tuples field by field", () => {
    const expected = Type.tuple([
      ["a", Type.buffer(10)],
      ["b", Type.uint],
    ]);

    expect(
      expected.admits(
        Type.tuple([
          ["b", Type.uint],
          ["a", Type.buffer(4)],
        ]),
      ),
    ).toBe(true);
    expect(expected.admits(Type.tuple([["a", Type.buffer(4)]]))).toBe(false);
  });

  it("only admits trait references with the same alias", () => {
    expect(Type.traitReference("t").admits(Type.traitReference("t"))).toBe(
      true,
    );
    expect(Type.traitReference("t").admits(Type.traitReference("u"))).toBe(
      false,
    );
    expect(Type.traitReference("t").admits(Type.principal)).toBe(false);
  });
});

describe("Type.toString", () => {
  it("prints signatures as written in source", () => {
    expect(Type.response(Type.buffer(32), Type.uint).toString()).toBe(
      "(response (buff 32) uint)",
    );
    expect(Type.list(Type.optional(Type.int), 4).toString()).toBe(
      "(list 4 (optional int))",
    );
    expect(Type.traitReference("t").toString()).toBe("<t>");
    expect(Type.noType.toString()).toBe("UnknownType");
  });

  it("prints tuple fields in name order", () => {
    const tuple = Type.tuple([
      ["b", Type.uint],
      ["a", Type.int],
    ]);
    expect(tuple.toString()).toBe("(tuple (a int) (b uint))");
  });
});

describe("Type.size and Type.depth", () => {
  it("counts every node of the signature", () => {
    expect(Type.uint.size()).toBe(1);
    expect(Type.response(Type.uint, Type.uint).size()).toBe(3);
    expect(Type.optional(Type.list(Type.uint, 2)).size()).toBe(3);
    expect(
      Type.tuple([
        ["a", Type.uint],
        ["b", Type.bool],
      ]).size(),
    ).toBe(3);
  });

  it("measures nesting", () => {
    expect(Type.bool.depth()).toBe(1);
    expect(Type.optional(Type.optional(Type.uint)).depth()).toBe(3);
    expect(Type.response(Type.uint, Type.list(Type.int, 1)).depth()).toBe(3);
  });
});

describe("Type.containsTraitReference", () => {
  it("finds nested trait references", () => {
    expect(
      Type.containsTraitReference(
        Type.tuple([["x", Type.traitReference("t")]]),
      ),
    ).toBe(true);
    expect(
      Type.containsTraitReference(
        Type.optional(Type.response(Type.uint, Type.int)),
      ),
    ).toBe(false);
  });
});

describe("FunctionType", () => {
  it("prints fixed signatures", () => {
    const type = FunctionType.fixed(
      [
        { name: "a", signature: Type.uint },
        { name: "t", signature: Type.traitReference("trait-1") },
      ],
      Type.bool,
    );
    expect(FunctionType.toString(type)).toBe(
      "((a uint) (t <trait-1>)) -> bool",
    );
    expect(FunctionType.toSignature(type)).toEqual({
      args: [Type.uint, Type.traitReference("trait-1")],
      returns: Type.bool,
    });
  });
});

describe("identifiers", () => {
  it("parses qualified contract identifiers", () => {
    const id = QualifiedContractIdentifier.parse(`${TRANSIENT_ISSUER}.token`);

    expect(id?.name).toBe("token");
    expect(id?.toString()).toBe(`${TRANSIENT_ISSUER}.token`);
    expect(id?.equals(QualifiedContractIdentifier.local("token"))).toBe(true);
  });

  it("rejects malformed identifiers", () => {
    expect(QualifiedContractIdentifier.parse("token")).toBeUndefined();
    expect(QualifiedContractIdentifier.parse("lower.token")).toBeUndefined();
    expect(
      QualifiedContractIdentifier.parse(`${TRANSIENT_ISSUER}.9lives`),
    ).toBeUndefined();
  });

  it("compares traits by contract and name", () => {
    const a = new TraitIdentifier(QualifiedContractIdentifier.local("a"), "t");
    const b = new TraitIdentifier(QualifiedContractIdentifier.local("b"), "t");

    expect(a.equals(b)).toBe(false);
    expect(
      a.equals(
        new TraitIdentifier(QualifiedContractIdentifier.local("a"), "t"),
      ),
    ).toBe(true);
    expect([b, a].sort(TraitIdentifier.compare)).toEqual([a, b]);
  });

  it("orders traits field by field", () => {
    const trait = (issuer: string, contract: string, name: string) =>
      new TraitIdentifier(
        new QualifiedContractIdentifier(issuer, contract),
        name,
      );
    const short = trait(TRANSIENT_ISSUER, "a", "z");
    const hyphenated = trait(TRANSIENT_ISSUER, "a-b", "a");
    const sameContract = trait(TRANSIENT_ISSUER, "a", "b");
    const otherIssuer = trait("S0ISSUER0000000000000000000000", "a", "a");

    expect(
      [hyphenated, short, otherIssuer, sameContract].sort(
        TraitIdentifier.compare,
      ),
    ).toEqual([otherIssuer, sameContract, short, hyphenated]);
  });
});
