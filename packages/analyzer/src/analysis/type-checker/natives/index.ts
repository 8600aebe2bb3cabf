/**
 * Built-in functions
 *
 * Functions whose arguments are all evaluated and typed in order are
 * described by a `FunctionType`; everything else has a special handler.
 */

import { FunctionType, Type } from "#types";

import { MAX_BUFFER_LENGTH } from "../signatures.js";

import { assetHandlers } from "./assets.js";
import { contractCallHandlers } from "./contract-call.js";
import { controlHandlers } from "./control.js";
import type { SpecialHandler } from "./handler.js";
import { storageHandlers } from "./storage.js";

export type { SpecialHandler } from "./handler.js";
export * from "./assets.js";

const MAX_HASH_INPUT = Type.buffer(MAX_BUFFER_LENGTH);

export const nativeFunctions: ReadonlyMap<string, FunctionType> = new Map<
  string,
  FunctionType
>([
  ["+", FunctionType.arithmeticVariadic],
  ["-", FunctionType.arithmeticVariadic],
  ["*", FunctionType.arithmeticVariadic],
  ["/", FunctionType.arithmeticVariadic],
  ["<", FunctionType.arithmeticComparison],
  [">", FunctionType.arithmeticComparison],
  ["<=", FunctionType.arithmeticComparison],
  [">=", FunctionType.arithmeticComparison],
  ["and", FunctionType.variadic(Type.bool, Type.bool)],
  ["or", FunctionType.variadic(Type.bool, Type.bool)],
  [
    "not",
    FunctionType.fixed([{ name: "value", signature: Type.bool }], Type.bool),
  ],
  [
    "to-int",
    FunctionType.fixed([{ name: "value", signature: Type.uint }], Type.int),
  ],
  [
    "to-uint",
    FunctionType.fixed([{ name: "value", signature: Type.int }], Type.uint),
  ],
  [
    "sha256",
    FunctionType.unionArgs(
      [MAX_HASH_INPUT, Type.uint, Type.int],
      Type.buffer(32),
    ),
  ],
  [
    "hash160",
    FunctionType.unionArgs(
      [MAX_HASH_INPUT, Type.uint, Type.int],
      Type.buffer(20),
    ),
  ],
]);

export const specialHandlers: ReadonlyMap<string, SpecialHandler> = new Map(
  Object.entries({
    ...controlHandlers,
    ...storageHandlers,
    ...contractCallHandlers,
    ...assetHandlers,
  }),
);

export const reservedVariables: ReadonlyMap<string, Type> = new Map<
  string,
  Type
>([
  ["true", Type.bool],
  ["false", Type.bool],
  ["none", Type.optional(Type.noType)],
  ["tx-sender", Type.principal],
  ["contract-caller", Type.principal],
  ["block-height", Type.uint],
]);

export const defineForms = new Set([
  "define-constant",
  "define-data-var",
  "define-map",
  "define-fungible-token",
  "define-non-fungible-token",
  "define-public",
  "define-private",
  "define-read-only",
  "define-trait",
  "use-trait",
  "impl-trait",
]);

/** Names used in type signatures */
export const typeNames = new Set([
  "int",
  "uint",
  "bool",
  "principal",
  "buff",
  "optional",
  "response",
  "list",
  "tuple",
]);

/**
 * Whether `name` belongs to the language and cannot be defined or bound
 */
export function isReservedName(name: string): boolean {
  return (
    reservedVariables.has(name) ||
    nativeFunctions.has(name) ||
    specialHandlers.has(name) ||
    defineForms.has(name) ||
    typeNames.has(name)
  );
}
