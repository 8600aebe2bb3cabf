/**
 * Function signatures
 */

import { Type } from "./definitions.js";

export interface FunctionArg {
  name: string;
  signature: Type;
}

/**
 * Required method of a trait: positional argument types and a return type
 */
export interface FunctionSignature {
  args: Type[];
  returns: Type;
}

export type FunctionType =
  | FunctionType.Fixed
  | FunctionType.Variadic
  | FunctionType.UnionArgs
  | FunctionType.ArithmeticVariadic
  | FunctionType.ArithmeticComparison;

export namespace FunctionType {
  export interface Fixed {
    kind: "fixed";
    args: FunctionArg[];
    returns: Type;
  }

  /** Any number of arguments of one type */
  export interface Variadic {
    kind: "variadic";
    input: Type;
    returns: Type;
  }

  /** A single argument admitted by one of several types */
  export interface UnionArgs {
    kind: "union-args";
    inputs: Type[];
    returns: Type;
  }

  /** `int` or `uint` operands, all of the same type, result of that type */
  export interface ArithmeticVariadic {
    kind: "arithmetic-variadic";
  }

  /** two `int` or two `uint` operands, `bool` result */
  export interface ArithmeticComparison {
    kind: "arithmetic-comparison";
  }

  export const fixed = (args: FunctionArg[], returns: Type): Fixed => ({
    kind: "fixed",
    args,
    returns,
  });

  export const variadic = (input: Type, returns: Type): Variadic => ({
    kind: "variadic",
    input,
    returns,
  });

  export const unionArgs = (inputs: Type[], returns: Type): UnionArgs => ({
    kind: "union-args",
    inputs,
    returns,
  });

  export const arithmeticVariadic: ArithmeticVariadic = {
    kind: "arithmetic-variadic",
  };

  export const arithmeticComparison: ArithmeticComparison = {
    kind: "arithmetic-comparison",
  };

  export const isFixed = (type: FunctionType): type is Fixed =>
    type.kind === "fixed";

  export function toString(type: FunctionType): string {
    switch (type.kind) {
      case "fixed": {
        const args = type.args
          .map((arg) => `(${arg.name} ${arg.signature.toString()})`)
          .join(" ");
        return `(${args}) -> ${type.returns.toString()}`;
      }
      case "variadic":
        return `(${type.input.toString()} ...) -> ${type.returns.toString()}`;
      case "union-args": {
        const inputs = type.inputs.map((t) => t.toString()).join(" | ");
        return `(${inputs}) -> ${type.returns.toString()}`;
      }
      case "arithmetic-variadic":
        return "(int ...) -> int | (uint ...) -> uint";
      case "arithmetic-comparison":
        return "(int int) -> bool | (uint uint) -> bool";
    }
  }

  /**
   * The signature a trait would require of a fixed function
   */
  export const toSignature = (fixed: Fixed): FunctionSignature => ({
    args: fixed.args.map((arg) => arg.signature),
    returns: fixed.returns,
  });
}
