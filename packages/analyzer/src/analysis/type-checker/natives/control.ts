/**
 * Sequencing, branching, bindings and composite values
 */

import { Expression } from "#ast";
import { Result } from "#result";
import { Type } from "#types";

import { CheckErrors, type CheckError } from "../../errors.js";
import type { TypeChecker } from "../checker.js";
import type { TypingContext } from "../context.js";
import { checkArgumentCount, checkArgumentsAtLeast } from "../functions.js";
import { matchNamedPair } from "../signatures.js";
import { leastSupertype } from "../supertype.js";

import type { SpecialHandler } from "./handler.js";

/**
 * Checks every expression in order, giving the type of the last
 */
function checkSequence(
  checker: TypeChecker,
  body: Expression[],
  context: TypingContext,
): Result<Type, CheckError> {
  let last: Type = Type.noType;
  for (const expr of body) {
    const type = checker.typeCheck(expr, context);
    if (!type.success) {
      return type;
    }
    last = type.value;
  }
  return Result.ok(last);
}

/** `(begin expr ...)` */
export const checkSpecialBegin: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentsAtLeast(1, args);
  if (!count.success) {
    return count;
  }
  return checkSequence(checker, args, context);
};

/** `(if condition then else)` */
export const checkSpecialIf: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(3, args);
  if (!count.success) {
    return count;
  }
  const [condition, thenBranch, elseBranch] = args;

  const checked = checker.typeCheckExpects(condition, context, Type.bool);
  if (!checked.success) {
    return checked;
  }

  const thenType = checker.typeCheck(thenBranch, context);
  if (!thenType.success) {
    return thenType;
  }
  const elseType = checker.typeCheck(elseBranch, context);
  if (!elseType.success) {
    return elseType;
  }

  const type = leastSupertype(thenType.value, elseType.value);
  if (!type) {
    return Result.err(
      CheckErrors.typeError(thenType.value, elseType.value).at(elseBranch.loc),
    );
  }
  return Result.ok(type);
};

/**
 * `(let ((name expr) ...) body ...)`
 *
 * Bindings are evaluated in the enclosing scope, so a binding cannot see
 * the names bound beside it.
 */
export const checkSpecialLet: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentsAtLeast(2, args);
  if (!count.success) {
    return count;
  }
  const [bindingList, ...body] = args;

  const bindings = Expression.matchList(bindingList);
  if (!bindings) {
    return Result.err(
      CheckErrors.badSyntax("expected a list of bindings").at(bindingList.loc),
    );
  }

  const bound = new Map<string, Type>();
  for (const binding of bindings) {
    const pair = matchNamedPair(binding);
    if (!pair) {
      return Result.err(
        CheckErrors.badSyntax("expected (<name> <expression>)").at(binding.loc),
      );
    }
    const [name, valueExpr] = pair;

    if (bound.has(name)) {
      return Result.err(CheckErrors.nameAlreadyUsed(name).at(binding.loc));
    }
    const unused = checker.checkNameUnused(name, binding.loc);
    if (!unused.success) {
      return unused;
    }

    const type = checker.typeCheck(valueExpr, context);
    if (!type.success) {
      return type;
    }
    bound.set(name, type.value);
  }

  return checkSequence(checker, body, context.extend(bound));
};

/**
 * Type of a value placed inside a response, optional or tuple; trait
 * values cannot be
 */
function checkWrapped(
  checker: TypeChecker,
  expr: Expression,
  context: TypingContext,
): Result<Type, CheckError> {
  const type = checker.typeCheck(expr, context);
  if (!type.success) {
    return type;
  }
  const allowed = checker.checkNoTraitReference(type.value, expr.loc);
  if (!allowed.success) {
    return allowed;
  }
  return type;
}

/** `(ok value)` */
export const checkSpecialOk: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(1, args);
  if (!count.success) {
    return count;
  }
  return Result.map(checkWrapped(checker, args[0], context), (type) =>
    Type.response(type, Type.noType),
  );
};

/** `(err value)` */
export const checkSpecialErr: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(1, args);
  if (!count.success) {
    return count;
  }
  return Result.map(checkWrapped(checker, args[0], context), (type) =>
    Type.response(Type.noType, type),
  );
};

/** `(some value)` */
export const checkSpecialSome: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(1, args);
  if (!count.success) {
    return count;
  }
  return Result.map(checkWrapped(checker, args[0], context), Type.optional);
};

/** `(is-eq a b ...)`: every operand must share one type */
export const checkSpecialIsEq: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentsAtLeast(1, args);
  if (!count.success) {
    return count;
  }

  let common: Type = Type.noType;
  for (const arg of args) {
    const type = checker.typeCheck(arg, context);
    if (!type.success) {
      return type;
    }
    const joined = leastSupertype(common, type.value);
    if (!joined) {
      return Result.err(CheckErrors.typeError(common, type.value).at(arg.loc));
    }
    common = joined;
  }
  return Result.ok(Type.bool);
};

/** `(tuple (name value) ...)` */
export const checkSpecialTuple: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentsAtLeast(1, args);
  if (!count.success) {
    return count;
  }

  const fields = new Map<string, Type>();
  for (const arg of args) {
    const pair = matchNamedPair(arg);
    if (!pair) {
      return Result.err(
        CheckErrors.badSyntax("expected (<name> <expression>)").at(arg.loc),
      );
    }
    const [name, valueExpr] = pair;
    if (fields.has(name)) {
      return Result.err(CheckErrors.nameAlreadyUsed(name).at(arg.loc));
    }

    const type = checkWrapped(checker, valueExpr, context);
    if (!type.success) {
      return type;
    }
    fields.set(name, type.value);
  }
  return Result.ok(Type.tuple(fields));
};

/** `(get field tuple)` */
export const checkSpecialGet: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const [fieldExpr, tupleExpr] = args;

  const field = Expression.matchAtom(fieldExpr);
  if (field === undefined) {
    return Result.err(
      CheckErrors.badSyntax("expected a tuple field name").at(fieldExpr.loc),
    );
  }

  const tupleType = checker.typeCheck(tupleExpr, context);
  if (!tupleType.success) {
    return tupleType;
  }
  if (!Type.isTuple(tupleType.value)) {
    return Result.err(
      CheckErrors.badSyntax(
        `expected a tuple, found '${tupleType.value.toString()}'`,
      ).at(tupleExpr.loc),
    );
  }

  const type = tupleType.value.getFieldType(field);
  if (!type) {
    return Result.err(
      CheckErrors.noSuchTupleField(field, tupleType.value).at(fieldExpr.loc),
    );
  }
  return Result.ok(type);
};

export const controlHandlers: Record<string, SpecialHandler> = {
  begin: checkSpecialBegin,
  if: checkSpecialIf,
  let: checkSpecialLet,
  ok: checkSpecialOk,
  err: checkSpecialErr,
  some: checkSpecialSome,
  "is-eq": checkSpecialIsEq,
  tuple: checkSpecialTuple,
  get: checkSpecialGet,
};
