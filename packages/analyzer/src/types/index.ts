/**
 * Type system for contract analysis
 *
 * Kept apart from the checker so that records, the parser and tooling can
 * refer to types without depending on the checking logic.
 */

export { Type } from "./definitions.js";
export {
  FunctionType,
  type FunctionArg,
  type FunctionSignature,
} from "./signatures.js";
export * from "./identifiers.js";

import type { Type } from "./definitions.js";

/** Inferred type of every expression, keyed by expression id */
export type TypeMap = Map<number, Type>;
