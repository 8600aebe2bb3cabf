/**
 * Parser-specific errors and error codes
 */

import { AnalysisError } from "#errors";
import type { SourceLocation } from "#ast";

export enum ParseErrorCode {
  UNEXPECTED_CHARACTER = "PARSE001",
  UNTERMINATED_STRING = "PARSE002",
  INVALID_ESCAPE = "PARSE003",
  UNEXPECTED_CLOSE = "PARSE004",
  UNCLOSED_LIST = "PARSE005",
  INVALID_BUFFER = "PARSE006",
  INVALID_PRINCIPAL = "PARSE007",
  INTEGER_OUT_OF_RANGE = "PARSE008",
  EXPRESSION_TOO_DEEP = "PARSE009",
  TOO_MANY_EXPRESSIONS = "PARSE010",
}

export const ParseErrorMessages = {
  [ParseErrorCode.UNEXPECTED_CHARACTER]: "Unexpected character",
  [ParseErrorCode.UNTERMINATED_STRING]: "Unterminated string literal",
  [ParseErrorCode.INVALID_ESCAPE]: "Invalid escape sequence in string literal",
  [ParseErrorCode.UNEXPECTED_CLOSE]:
    "Closing parenthesis without a matching open",
  [ParseErrorCode.UNCLOSED_LIST]: "List is never closed",
  [ParseErrorCode.INVALID_BUFFER]:
    "Hex buffer literal must have an even number of digits",
  [ParseErrorCode.INVALID_PRINCIPAL]: "Invalid principal literal",
  [ParseErrorCode.INTEGER_OUT_OF_RANGE]: "Integer literal out of range",
  [ParseErrorCode.EXPRESSION_TOO_DEEP]: "Expressions nested too deeply",
  [ParseErrorCode.TOO_MANY_EXPRESSIONS]: "Too many expressions in contract",
};

export class ParseError extends AnalysisError {
  constructor(
    code: ParseErrorCode,
    detail?: string,
    location?: SourceLocation,
  ) {
    const base = ParseErrorMessages[code];
    super(detail ? `${base}: ${detail}` : base, code, location);
  }
}
