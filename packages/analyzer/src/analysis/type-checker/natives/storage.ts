/**
 * Persisted variables and maps
 */

import { Expression } from "#ast";
import { Result } from "#result";
import { Type } from "#types";

import { CheckErrors, type CheckError } from "../../errors.js";
import { checkArgumentCount } from "../functions.js";

import type { SpecialHandler } from "./handler.js";

function matchStorageName(expr: Expression): Result<string, CheckError> {
  const name = Expression.matchAtom(expr);
  if (name === undefined) {
    return Result.err(
      CheckErrors.badSyntax("expected a variable or map name").at(expr.loc),
    );
  }
  return Result.ok(name);
}

/** `(var-get name)` */
export const checkSpecialVarGet: SpecialHandler = (checker, args) => {
  const count = checkArgumentCount(1, args);
  if (!count.success) {
    return count;
  }
  const name = matchStorageName(args[0]);
  if (!name.success) {
    return name;
  }

  const type = checker.analysis.getPersistedVariableType(name.value);
  if (!type) {
    return Result.err(
      CheckErrors.noSuchDataVariable(name.value).at(args[0].loc),
    );
  }
  return Result.ok(type);
};

/** `(var-set name value)` */
export const checkSpecialVarSet: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const name = matchStorageName(args[0]);
  if (!name.success) {
    return name;
  }

  const type = checker.analysis.getPersistedVariableType(name.value);
  if (!type) {
    return Result.err(
      CheckErrors.noSuchDataVariable(name.value).at(args[0].loc),
    );
  }

  const checked = checker.typeCheckExpects(args[1], context, type);
  return Result.map(checked, () => Type.bool);
};

/** `(map-get? name key)` */
export const checkSpecialMapGet: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const name = matchStorageName(args[0]);
  if (!name.success) {
    return name;
  }

  const mapType = checker.analysis.getMapType(name.value);
  if (!mapType) {
    return Result.err(CheckErrors.noSuchMap(name.value).at(args[0].loc));
  }
  const [keyType, valueType] = mapType;

  const checked = checker.typeCheckExpects(args[1], context, keyType);
  return Result.map(checked, () => Type.optional(valueType));
};

/** `(map-set name key value)` */
export const checkSpecialMapSet: SpecialHandler = (checker, args, context) => {
  const count = checkArgumentCount(3, args);
  if (!count.success) {
    return count;
  }
  const name = matchStorageName(args[0]);
  if (!name.success) {
    return name;
  }

  const mapType = checker.analysis.getMapType(name.value);
  if (!mapType) {
    return Result.err(CheckErrors.noSuchMap(name.value).at(args[0].loc));
  }
  const [keyType, valueType] = mapType;

  const key = checker.typeCheckExpects(args[1], context, keyType);
  if (!key.success) {
    return key;
  }
  const value = checker.typeCheckExpects(args[2], context, valueType);
  return Result.map(value, () => Type.bool);
};

export const storageHandlers: Record<string, SpecialHandler> = {
  "var-get": checkSpecialVarGet,
  "var-set": checkSpecialVarSet,
  "map-get?": checkSpecialMapGet,
  "map-set": checkSpecialMapSet,
};
