export const VERSION = "0.1.0";

export * as Ast from "#ast";

// Re-export parser functionality
export { parse, type ParseOptions } from "#parser";
export { ParseError, ParseErrorCode } from "#parser";

// Re-export type system
export * from "#types";

// Re-export analysis passes and records
export * from "#analysis";

// Re-export cost metering
export * from "#costs";

// Re-export error handling utilities
export * from "#errors";

// Re-export result type
export * from "#result";

// CLI utilities are not exported; import them from ./cli in Node.js code
