/**
 * Type signatures for contract values
 */

export interface Type {
  kind: Type.Kind;
  toString(): string;
  equals(other: Type): boolean;

  /**
   * Whether a value of type `other` may be used where this type is required
   */
  admits(other: Type): boolean;

  /**
   * Size of the signature itself, used as the input of analysis cost
   * functions
   */
  size(): number;

  /** Nesting depth, 1 for atomic types */
  depth(): number;
}

export namespace Type {
  export type Kind =
    | Type.Atomic.Kind
    | "buffer"
    | "optional"
    | "response"
    | "list"
    | "tuple"
    | "trait-reference";

  export const MAX_TYPE_DEPTH = 32;

  // Types without parameters
  export class Atomic implements Type {
    constructor(public kind: Type.Atomic.Kind) {}

    toString(): string {
      return this.kind === "no-type" ? "UnknownType" : this.kind;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Atomic && other.kind === this.kind;
    }

    admits(other: Type): boolean {
      if (this.kind === "no-type") {
        return false;
      }
      return this.equals(other);
    }

    size(): number {
      return 1;
    }

    depth(): number {
      return 1;
    }
  }

  export namespace Atomic {
    export type Kind = "no-type" | "int" | "uint" | "bool" | "principal";
  }

  export const noType = new Type.Atomic("no-type");
  export const int = new Type.Atomic("int");
  export const uint = new Type.Atomic("uint");
  export const bool = new Type.Atomic("bool");
  export const principal = new Type.Atomic("principal");

  export const isAtomic = (type: Type): type is Type.Atomic =>
    type instanceof Type.Atomic;

  export const isNoType = (type: Type): boolean => type.kind === "no-type";

  export class Buffer implements Type {
    kind = "buffer" as const;

    constructor(public length: number) {}

    toString(): string {
      return `(buff ${this.length})`;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Buffer && other.length === this.length;
    }

    admits(other: Type): boolean {
      return other instanceof Type.Buffer && other.length <= this.length;
    }

    size(): number {
      return 1;
    }

    depth(): number {
      return 1;
    }
  }

  export const isBuffer = (type: Type): type is Type.Buffer =>
    type instanceof Type.Buffer;

  export class Optional implements Type {
    kind = "optional" as const;

    constructor(public inner: Type) {}

    toString(): string {
      return `(optional ${this.inner.toString()})`;
    }

    equals(other: Type): boolean {
      return other instanceof Type.Optional && this.inner.equals(other.inner);
    }

    admits(other: Type): boolean {
      if (!(other instanceof Type.Optional)) {
        return false;
      }
      // `none` carries no inner type and fits any optional
      if (isNoType(other.inner)) {
        return true;
      }
      return this.inner.admits(other.inner);
    }

    size(): number {
      return 1 + this.inner.size();
    }

    depth(): number {
      return 1 + this.inner.depth();
    }
  }

  export const isOptional = (type: Type): type is Type.Optional =>
    type instanceof Type.Optional;

  export class Response implements Type {
    kind = "response" as const;

    constructor(
      public ok: Type,
      public err: Type,
    ) {}

    toString(): string {
      return `(response ${this.ok.toString()} ${this.err.toString()})`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.Response &&
        this.ok.equals(other.ok) &&
        this.err.equals(other.err)
      );
    }

    admits(other: Type): boolean {
      if (!(other instanceof Type.Response)) {
        return false;
      }
      const okUnknown = isNoType(other.ok);
      const errUnknown = isNoType(other.err);
      if (okUnknown && errUnknown) {
        return false;
      }
      if (okUnknown) {
        return this.err.admits(other.err);
      }
      if (errUnknown) {
        return this.ok.admits(other.ok);
      }
      return this.ok.admits(other.ok) && this.err.admits(other.err);
    }

    size(): number {
      return 1 + this.ok.size() + this.err.size();
    }

    depth(): number {
      return 1 + Math.max(this.ok.depth(), this.err.depth());
    }
  }

  export const isResponse = (type: Type): type is Type.Response =>
    type instanceof Type.Response;

  export class List implements Type {
    kind = "list" as const;

    constructor(
      public entry: Type,
      public maxLength: number,
    ) {}

    toString(): string {
      return `(list ${this.maxLength} ${this.entry.toString()})`;
    }

    equals(other: Type): boolean {
      return (
        other instanceof Type.List &&
        other.maxLength === this.maxLength &&
        this.entry.equals(other.entry)
      );
    }

    admits(other: Type): boolean {
      if (!(other instanceof Type.List) || other.maxLength > this.maxLength) {
        return false;
      }
      // empty list literal
      if (isNoType(other.entry)) {
        return true;
      }
      return this.entry.admits(other.entry);
    }

    size(): number {
      return 1 + this.entry.size();
    }

    depth(): number {
      return 1 + this.entry.depth();
    }
  }

  export const isList = (type: Type): type is Type.List =>
    type instanceof Type.List;

  export class Tuple implements Type {
    kind = "tuple" as const;
    public fields: Map<string, Type>;

    constructor(fields: Iterable<[string, Type]>) {
      // canonical order, so that equal tuples print equally
      this.fields = new Map(
        [...fields].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
      );
    }

    toString(): string {
      const fields = [...this.fields]
        .map(([name, type]) => `(${name} ${type.toString()})`)
        .join(" ");
      return `(tuple ${fields})`;
    }

    equals(other: Type): boolean {
      if (
        !(other instanceof Type.Tuple) ||
        other.fields.size !== this.fields.size
      ) {
        return false;
      }
      for (const [name, type] of this.fields) {
        const otherType = other.fields.get(name);
        if (!otherType || !type.equals(otherType)) {
          return false;
        }
      }
      return true;
    }

    admits(other: Type): boolean {
      if (
        !(other instanceof Type.Tuple) ||
        other.fields.size !== this.fields.size
      ) {
        return false;
      }
      for (const [name, type] of this.fields) {
        const otherType = other.fields.get(name);
        if (!otherType || !type.admits(otherType)) {
          return false;
        }
      }
      return true;
    }

    getFieldType(name: string): Type | undefined {
      return this.fields.get(name);
    }

    size(): number {
      let size = 1;
      for (const type of this.fields.values()) {
        size += type.size();
      }
      return size;
    }

    depth(): number {
      let deepest = 0;
      for (const type of this.fields.values()) {
        deepest = Math.max(deepest, type.depth());
      }
      return 1 + deepest;
    }
  }

  export const isTuple = (type: Type): type is Type.Tuple =>
    type instanceof Type.Tuple;

  /**
   * Reference to a trait by its alias in the owning contract's namespace.
   *
   * Identity is nominal: two references are only interchangeable when
   * they resolve to the same trait, which `admits` can only decide within
   * a single namespace (equal aliases). Comparisons across contracts go
   * through the contracts' trait namespaces instead.
   */
  export class TraitReference implements Type {
    kind = "trait-reference" as const;

    constructor(public alias: string) {}

    toString(): string {
      return `<${this.alias}>`;
    }

    equals(other: Type): boolean {
      return other instanceof Type.TraitReference && other.alias === this.alias;
    }

    admits(other: Type): boolean {
      return this.equals(other);
    }

    size(): number {
      return 1;
    }

    depth(): number {
      return 1;
    }
  }

  export const isTraitReference = (type: Type): type is Type.TraitReference =>
    type instanceof Type.TraitReference;

  /**
   * Whether a trait reference occurs anywhere inside `type`
   */
  export function containsTraitReference(type: Type): boolean {
    if (type instanceof Type.TraitReference) {
      return true;
    }
    if (type instanceof Type.Optional) {
      return containsTraitReference(type.inner);
    }
    if (type instanceof Type.Response) {
      return (
        containsTraitReference(type.ok) || containsTraitReference(type.err)
      );
    }
    if (type instanceof Type.List) {
      return containsTraitReference(type.entry);
    }
    if (type instanceof Type.Tuple) {
      return [...type.fields.values()].some(containsTraitReference);
    }
    return false;
  }

  // Factories
  export const buffer = (length: number) => new Type.Buffer(length);
  export const optional = (inner: Type) => new Type.Optional(inner);
  export const response = (ok: Type, err: Type) => new Type.Response(ok, err);
  export const list = (entry: Type, maxLength: number) =>
    new Type.List(entry, maxLength);
  export const tuple = (fields: Iterable<[string, Type]>) =>
    new Type.Tuple(fields);
  export const traitReference = (alias: string) =>
    new Type.TraitReference(alias);
}
