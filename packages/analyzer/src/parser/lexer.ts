/**
 * Tokenizer for contract source
 */

import type { SourceLocation } from "#ast";
import { Result } from "#result";

import { ParseError, ParseErrorCode } from "./errors.js";

export type Token =
  | { kind: "open"; loc: SourceLocation }
  | { kind: "close"; loc: SourceLocation }
  | { kind: "int"; text: string; loc: SourceLocation }
  | { kind: "uint"; text: string; loc: SourceLocation }
  | { kind: "string"; value: string; loc: SourceLocation }
  | { kind: "hex"; text: string; loc: SourceLocation }
  | { kind: "principal"; text: string; loc: SourceLocation }
  | { kind: "relative"; text: string; loc: SourceLocation }
  | { kind: "trait-reference"; name: string; loc: SourceLocation }
  | { kind: "atom"; name: string; loc: SourceLocation };

const NAME = "[a-zA-Z]([a-zA-Z0-9]|[-_!?+<>=/*])*";
const CONTRACT_NAME = "[a-zA-Z]([a-zA-Z0-9]|[-_])*";

type Matcher = {
  pattern: RegExp;
  token: (text: string, loc: SourceLocation) => Token;
};

// Order matters: earlier patterns win
const matchers: Matcher[] = [
  {
    pattern: /u[0-9]+/y,
    token: (text, loc) => ({ kind: "uint", text: text.slice(1), loc }),
  },
  {
    pattern: /-?[0-9]+/y,
    token: (text, loc) => ({ kind: "int", text, loc }),
  },
  {
    pattern: /0x[0-9a-fA-F]*/y,
    token: (text, loc) => ({ kind: "hex", text: text.slice(2), loc }),
  },
  {
    pattern: new RegExp(`'[0-9A-Z]+(\\.${CONTRACT_NAME}){0,2}`, "y"),
    token: (text, loc) => ({ kind: "principal", text: text.slice(1), loc }),
  },
  {
    pattern: new RegExp(`\\.${CONTRACT_NAME}(\\.${CONTRACT_NAME})?`, "y"),
    token: (text, loc) => ({ kind: "relative", text: text.slice(1), loc }),
  },
  {
    pattern: new RegExp(`<${CONTRACT_NAME}>`, "y"),
    token: (text, loc) => ({
      kind: "trait-reference",
      name: text.slice(1, -1),
      loc,
    }),
  },
  {
    pattern: new RegExp(`${NAME}|[-+=/*]|[<>]=?`, "y"),
    token: (text, loc) => ({ kind: "atom", name: text, loc }),
  },
];

const isDelimiter = (char: string | undefined): boolean =>
  char === undefined || /[\s();]/.test(char);

const ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
};

export function tokenize(source: string): Result<Token[], ParseError> {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < source.length) {
    const char = source[offset];

    if (/\s/.test(char)) {
      offset++;
      continue;
    }

    if (char === ";") {
      while (offset < source.length && source[offset] !== "\n") {
        offset++;
      }
      continue;
    }

    if (char === "(" || char === ")") {
      tokens.push({
        kind: char === "(" ? "open" : "close",
        loc: { offset, length: 1 },
      });
      offset++;
      continue;
    }

    if (char === '"') {
      const string = readString(source, offset);
      if (!string.success) {
        return string;
      }
      tokens.push(string.value);
      offset += string.value.loc.length;
      continue;
    }

    const token = matchToken(source, offset);
    if (!token) {
      return Result.err(
        new ParseError(
          ParseErrorCode.UNEXPECTED_CHARACTER,
          JSON.stringify(char),
          { offset, length: 1 },
        ),
      );
    }
    tokens.push(token);
    offset += token.loc.length;
  }

  return Result.ok(tokens);
}

function matchToken(source: string, offset: number): Token | undefined {
  for (const { pattern, token } of matchers) {
    pattern.lastIndex = offset;
    const match = pattern.exec(source);
    if (!match) {
      continue;
    }
    const text = match[0];
    if (!isDelimiter(source[offset + text.length])) {
      continue;
    }
    return token(text, { offset, length: text.length });
  }
  return undefined;
}

function readString(
  source: string,
  start: number,
): Result<Token & { kind: "string" }, ParseError> {
  let value = "";
  let offset = start + 1;

  while (offset < source.length) {
    const char = source[offset];
    if (char === '"') {
      return Result.ok({
        kind: "string",
        value,
        loc: { offset: start, length: offset + 1 - start },
      });
    }
    if (char === "\\") {
      const escaped = ESCAPES[source[offset + 1] ?? ""];
      if (escaped === undefined) {
        return Result.err(
          new ParseError(ParseErrorCode.INVALID_ESCAPE, undefined, {
            offset,
            length: 2,
          }),
        );
      }
      value += escaped;
      offset += 2;
      continue;
    }
    value += char;
    offset++;
  }

  return Result.err(
    new ParseError(ParseErrorCode.UNTERMINATED_STRING, undefined, {
      offset: start,
      length: source.length - start,
    }),
  );
}
