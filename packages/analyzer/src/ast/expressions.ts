/**
 * Expression tree for contract source.
 *
 * Contracts are S-expressions: every node is either a list of child
 * expressions or one of the leaf kinds below. Leaves are discriminated
 * by `kind`.
 */

import type { TraitIdentifier } from "#types";

export interface SourceLocation {
  offset: number;
  length: number;
}

/**
 * Positional index of an expression, unique within one contract.
 * Zero until the identifier pass has run.
 */
export type Id = number;

export type Expression =
  | Expression.Atom
  | Expression.Literal
  | Expression.List
  | Expression.TraitReference
  | Expression.Field;

export namespace Expression {
  export interface Base {
    id: Id;
    loc: SourceLocation | null;
  }

  export interface Atom extends Base {
    kind: "atom";
    name: string;
  }

  export interface Literal extends Base {
    kind: "value";
    value: Value;
  }

  export interface List extends Base {
    kind: "list";
    items: Expression[];
  }

  /** `<name>` in type position */
  export interface TraitReference extends Base {
    kind: "trait-reference";
    name: string;
  }

  /** `.contract.trait` or `'ISSUER.contract.trait` */
  export interface Field extends Base {
    kind: "field";
    trait: TraitIdentifier;
  }

  export const isAtom = (expr: Expression): expr is Atom =>
    expr.kind === "atom";

  export const isList = (expr: Expression): expr is List =>
    expr.kind === "list";

  export const isLiteral = (expr: Expression): expr is Literal =>
    expr.kind === "value";

  export const isField = (expr: Expression): expr is Field =>
    expr.kind === "field";

  export const isTraitReference = (expr: Expression): expr is TraitReference =>
    expr.kind === "trait-reference";

  /**
   * Name of an atom, or undefined for any other kind
   */
  export function matchAtom(expr: Expression): string | undefined {
    return expr.kind === "atom" ? expr.name : undefined;
  }

  export function matchList(expr: Expression): Expression[] | undefined {
    return expr.kind === "list" ? expr.items : undefined;
  }
}

/**
 * Literal values that can appear directly in source
 */
export type Value =
  | { kind: "int"; value: bigint }
  | { kind: "uint"; value: bigint }
  | { kind: "buffer"; bytes: Uint8Array }
  | { kind: "principal"; issuer: string; contract?: string };

/**
 * Expression constructors, used by the parser and by tests that
 * build trees by hand. Ids are assigned later by `identify`.
 */
export const Build = {
  atom(name: string, loc: SourceLocation | null = null): Expression.Atom {
    return { kind: "atom", id: 0, loc, name };
  },

  value(value: Value, loc: SourceLocation | null = null): Expression.Literal {
    return { kind: "value", id: 0, loc, value };
  },

  list(
    items: Expression[],
    loc: SourceLocation | null = null,
  ): Expression.List {
    return { kind: "list", id: 0, loc, items };
  },

  traitReference(
    name: string,
    loc: SourceLocation | null = null,
  ): Expression.TraitReference {
    return { kind: "trait-reference", id: 0, loc, name };
  },

  field(
    trait: TraitIdentifier,
    loc: SourceLocation | null = null,
  ): Expression.Field {
    return { kind: "field", id: 0, loc, trait };
  },
};
