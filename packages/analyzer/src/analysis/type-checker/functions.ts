import { Result } from "#result";
import { Type, type FunctionType } from "#types";

import { CheckErrors, type CheckError } from "../errors.js";

export function checkArgumentCount(
  expected: number,
  args: readonly unknown[],
): Result<void, CheckError> {
  if (args.length !== expected) {
    return Result.err(
      CheckErrors.incorrectArgumentCount(expected, args.length),
    );
  }
  return Result.ok(undefined);
}

export function checkArgumentsAtLeast(
  expected: number,
  args: readonly unknown[],
): Result<void, CheckError> {
  if (args.length < expected) {
    return Result.err(
      CheckErrors.incorrectArgumentCount(expected, args.length),
    );
  }
  return Result.ok(undefined);
}

const arithmeticOperands = [Type.int, Type.uint];

/**
 * Return type of a call to a function of the given shape, given the types
 * of its arguments
 */
export function checkArgumentsByFunctionType(
  type: FunctionType,
  argTypes: Type[],
): Result<Type, CheckError> {
  switch (type.kind) {
    case "fixed": {
      const count = checkArgumentCount(type.args.length, argTypes);
      if (!count.success) {
        return count;
      }
      for (let i = 0; i < argTypes.length; i++) {
        const expected = type.args[i].signature;
        if (!expected.admits(argTypes[i])) {
          return Result.err(CheckErrors.typeError(expected, argTypes[i]));
        }
      }
      return Result.ok(type.returns);
    }

    case "variadic": {
      const count = checkArgumentsAtLeast(1, argTypes);
      if (!count.success) {
        return count;
      }
      for (const argType of argTypes) {
        if (!type.input.admits(argType)) {
          return Result.err(CheckErrors.typeError(type.input, argType));
        }
      }
      return Result.ok(type.returns);
    }

    case "union-args": {
      const count = checkArgumentCount(1, argTypes);
      if (!count.success) {
        return count;
      }
      const [argType] = argTypes;
      if (!type.inputs.some((input) => input.admits(argType))) {
        return Result.err(CheckErrors.unionTypeError(type.inputs, argType));
      }
      return Result.ok(type.returns);
    }

    case "arithmetic-variadic": {
      const count = checkArgumentsAtLeast(1, argTypes);
      if (!count.success) {
        return count;
      }
      return checkOperands(argTypes);
    }

    case "arithmetic-comparison": {
      const count = checkArgumentCount(2, argTypes);
      if (!count.success) {
        return count;
      }
      return Result.map(checkOperands(argTypes), () => Type.bool);
    }
  }
}

/**
 * Operands must all be `int` or all be `uint`; gives the operand type
 */
function checkOperands(argTypes: Type[]): Result<Type, CheckError> {
  const [first, ...rest] = argTypes;
  if (!arithmeticOperands.some((operand) => operand.equals(first))) {
    return Result.err(CheckErrors.unionTypeError(arithmeticOperands, first));
  }
  for (const argType of rest) {
    if (!first.equals(argType)) {
      return Result.err(CheckErrors.typeError(first, argType));
    }
  }
  return Result.ok(first);
}
