/**
 * Expression tree module
 */

export * from "./expressions.js";
