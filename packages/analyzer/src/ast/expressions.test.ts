import { describe, expect, it } from "vitest";

import { QualifiedContractIdentifier, TraitIdentifier } from "#types";

import { Build, Expression } from "./expressions.js";

describe("Expression", () => {
  const trait = new TraitIdentifier(
    QualifiedContractIdentifier.local("defun"),
    "trait-1",
  );
  const expressions = [
    Build.atom("x"),
    Build.value({ kind: "uint", value: 1n }),
    Build.list([Build.atom("f")]),
    Build.traitReference("t"),
    Build.field(trait),
  ];

  it("narrows by kind", () => {
    expect(expressions.map(Expression.isAtom)).toEqual([
      true,
      false,
      false,
      false,
      false,
    ]);
    expect(expressions.map(Expression.isLiteral)).toEqual([
      false,
      true,
      false,
      false,
      false,
    ]);
    expect(expressions.map(Expression.isList)).toEqual([
      false,
      false,
      true,
      false,
      false,
    ]);
    expect(expressions.map(Expression.isTraitReference)).toEqual([
      false,
      false,
      false,
      true,
      false,
    ]);
    expect(expressions.map(Expression.isField)).toEqual([
      false,
      false,
      false,
      false,
      true,
    ]);
  });

  it("matches atoms and lists", () => {
    expect(expressions.map(Expression.matchAtom)).toEqual([
      "x",
      undefined,
      undefined,
      undefined,
      undefined,
    ]);
    expect(Expression.matchList(expressions[2])).toEqual([Build.atom("f")]);
    expect(Expression.matchList(expressions[0])).toBeUndefined();
  });

  it("builds unnumbered expressions without locations", () => {
    expect(Build.atom("x")).toEqual({
      kind: "atom",
      id: 0,
      loc: null,
      name: "x",
    });
    expect(Build.atom("x", { offset: 3, length: 1 }).loc).toEqual({
      offset: 3,
      length: 1,
    });
  });
});
