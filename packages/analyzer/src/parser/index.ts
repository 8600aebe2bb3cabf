/**
 * Parser module for contract source
 */

export { parse, MAX_NESTING_DEPTH, type ParseOptions } from "./parser.js";
export { identify, MAX_EXPRESSIONS } from "./identifier.js";
export { tokenize, type Token } from "./lexer.js";
export * from "./errors.js";
