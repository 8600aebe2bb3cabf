/**
 * Type signatures written in source, e.g. `(response (buff 32) uint)`
 */

import { Expression } from "#ast";
import { Result } from "#result";
import { Type, type FunctionArg } from "#types";

import { CheckErrors, type CheckError } from "../errors.js";

export const MAX_BUFFER_LENGTH = 1_048_576;
export const MAX_LIST_LENGTH = 1_048_576;

export interface SignatureOptions {
  /**
   * Whether the signature may be a trait reference. Trait references are
   * only ever allowed as the whole type of a parameter, never nested.
   */
  allowTraitReference?: boolean;
}

export function parseTypeSignature(
  expr: Expression,
  options: SignatureOptions = {},
): Result<Type, CheckError> {
  return parseAtDepth(expr, 1, options.allowTraitReference ?? false);
}

function parseAtDepth(
  expr: Expression,
  depth: number,
  allowTraitReference: boolean,
): Result<Type, CheckError> {
  if (depth > Type.MAX_TYPE_DEPTH) {
    return Result.err(
      CheckErrors.typeSignatureTooDeep(Type.MAX_TYPE_DEPTH).at(expr.loc),
    );
  }

  switch (expr.kind) {
    case "atom":
      return parseAtomicType(expr);

    case "trait-reference":
      if (!allowTraitReference) {
        return Result.err(CheckErrors.traitReferenceNotAllowed().at(expr.loc));
      }
      return Result.ok(Type.traitReference(expr.name));

    case "list":
      return parseCompositeType(expr, depth);

    default:
      return Result.err(
        CheckErrors.badSyntax("invalid type signature").at(expr.loc),
      );
  }
}

function parseAtomicType(expr: Expression.Atom): Result<Type, CheckError> {
  switch (expr.name) {
    case "int":
      return Result.ok(Type.int);
    case "uint":
      return Result.ok(Type.uint);
    case "bool":
      return Result.ok(Type.bool);
    case "principal":
      return Result.ok(Type.principal);
    default:
      return Result.err(
        CheckErrors.badSyntax(`unknown type '${expr.name}'`).at(expr.loc),
      );
  }
}

function parseCompositeType(
  expr: Expression.List,
  depth: number,
): Result<Type, CheckError> {
  const [head, ...rest] = expr.items;
  if (!head) {
    return Result.err(
      CheckErrors.badSyntax("empty type signature").at(expr.loc),
    );
  }

  // `((name type) ...)` is shorthand for a tuple
  if (head.kind === "list") {
    return parseTupleType(expr.items, depth, expr);
  }

  const inner = (e: Expression) => parseAtDepth(e, depth + 1, false);

  switch (Expression.matchAtom(head)) {
    case "buff": {
      const length = matchLength(rest, 1, MAX_BUFFER_LENGTH);
      if (length === undefined) {
        return Result.err(
          CheckErrors.badSyntax("expected (buff <length>)").at(expr.loc),
        );
      }
      return Result.ok(Type.buffer(length));
    }

    case "optional": {
      if (rest.length !== 1) {
        return Result.err(
          CheckErrors.badSyntax("expected (optional <type>)").at(expr.loc),
        );
      }
      return Result.map(inner(rest[0]), Type.optional);
    }

    case "response": {
      if (rest.length !== 2) {
        return Result.err(
          CheckErrors.badSyntax("expected (response <ok> <err>)").at(expr.loc),
        );
      }
      const ok = inner(rest[0]);
      if (!ok.success) {
        return ok;
      }
      return Result.map(inner(rest[1]), (err) => Type.response(ok.value, err));
    }

    case "list": {
      const maxLength = matchLength(rest.slice(0, 1), 0, MAX_LIST_LENGTH);
      if (rest.length !== 2 || maxLength === undefined) {
        return Result.err(
          CheckErrors.badSyntax("expected (list <length> <type>)").at(expr.loc),
        );
      }
      return Result.map(inner(rest[1]), (entry) => Type.list(entry, maxLength));
    }

    case "tuple":
      return parseTupleType(rest, depth, expr);

    default:
      return Result.err(
        CheckErrors.badSyntax("invalid type signature").at(expr.loc),
      );
  }
}

function parseTupleType(
  fields: Expression[],
  depth: number,
  expr: Expression,
): Result<Type, CheckError> {
  if (fields.length === 0) {
    return Result.err(CheckErrors.badSyntax("empty tuple type").at(expr.loc));
  }

  const entries = new Map<string, Type>();
  for (const field of fields) {
    const pair = matchNamedPair(field);
    if (!pair) {
      return Result.err(
        CheckErrors.badSyntax("expected (<name> <type>)").at(field.loc),
      );
    }
    const [name, typeExpr] = pair;
    if (entries.has(name)) {
      return Result.err(CheckErrors.nameAlreadyUsed(name).at(field.loc));
    }
    const type = parseAtDepth(typeExpr, depth + 1, false);
    if (!type.success) {
      return type;
    }
    entries.set(name, type.value);
  }
  return Result.ok(Type.tuple(entries));
}

/**
 * `((name type) ...)` parameter lists; a parameter may be a trait reference
 */
export function parseFunctionArgs(
  expressions: Expression[],
): Result<FunctionArg[], CheckError> {
  const args: FunctionArg[] = [];
  const seen = new Set<string>();

  for (const expr of expressions) {
    const pair = matchNamedPair(expr);
    if (!pair) {
      return Result.err(
        CheckErrors.badSyntax("expected (<name> <type>)").at(expr.loc),
      );
    }
    const [name, typeExpr] = pair;
    if (seen.has(name)) {
      return Result.err(CheckErrors.nameAlreadyUsed(name).at(expr.loc));
    }
    seen.add(name);

    const signature = parseTypeSignature(typeExpr, {
      allowTraitReference: true,
    });
    if (!signature.success) {
      return signature;
    }
    args.push({ name, signature: signature.value });
  }
  return Result.ok(args);
}

/**
 * `(name expr)`
 */
export function matchNamedPair(
  expr: Expression,
): [name: string, value: Expression] | undefined {
  const items = Expression.matchList(expr);
  if (!items || items.length !== 2) {
    return undefined;
  }
  const name = Expression.matchAtom(items[0]);
  return name === undefined ? undefined : [name, items[1]];
}

function matchLength(
  expressions: Expression[],
  min: number,
  max: number,
): number | undefined {
  if (expressions.length !== 1) {
    return undefined;
  }
  const [expr] = expressions;
  if (expr.kind !== "value") {
    return undefined;
  }
  const { value } = expr;
  if (value.kind !== "int" && value.kind !== "uint") {
    return undefined;
  }
  if (value.value < BigInt(min) || value.value > BigInt(max)) {
    return undefined;
  }
  return Number(value.value);
}
