/**
 * Parser for contract source
 *
 * Builds the expression tree iteratively, so that deeply nested input is
 * bounded by `MAX_NESTING_DEPTH` instead of by the JavaScript call stack.
 */

import { Build, type Expression, type SourceLocation, type Value } from "#ast";
import { Result } from "#result";
import {
  QualifiedContractIdentifier,
  TraitIdentifier,
  TRANSIENT_ISSUER,
  isContractName,
  isIssuer,
} from "#types";

import { ParseError, ParseErrorCode } from "./errors.js";
import { identify } from "./identifier.js";
import { tokenize, type Token } from "./lexer.js";

export const MAX_NESTING_DEPTH = 64;

const INT_MIN = -(2n ** 127n);
const INT_MAX = 2n ** 127n - 1n;
const UINT_MAX = 2n ** 128n - 1n;

export interface ParseOptions {
  /**
   * Issuer that `.contract` shorthands resolve against
   */
  issuer?: string;
}

interface OpenList {
  start: number;
  items: Expression[];
}

/**
 * Parses contract source into top-level expressions with ids assigned
 */
export function parse(
  source: string,
  options: ParseOptions = {},
): Result<Expression[], ParseError> {
  const tokens = tokenize(source);
  if (!tokens.success) {
    return tokens;
  }

  const issuer = options.issuer ?? TRANSIENT_ISSUER;
  const stack: OpenList[] = [{ start: 0, items: [] }];

  for (const token of tokens.value) {
    const current = stack[stack.length - 1];

    switch (token.kind) {
      case "open": {
        if (stack.length > MAX_NESTING_DEPTH) {
          return Result.err(
            new ParseError(
              ParseErrorCode.EXPRESSION_TOO_DEEP,
              `limit is ${MAX_NESTING_DEPTH}`,
              token.loc,
            ),
          );
        }
        stack.push({ start: token.loc.offset, items: [] });
        break;
      }
      case "close": {
        if (stack.length === 1) {
          return Result.err(
            new ParseError(
              ParseErrorCode.UNEXPECTED_CLOSE,
              undefined,
              token.loc,
            ),
          );
        }
        stack.pop();
        const parent = stack[stack.length - 1];
        parent.items.push(
          Build.list(current.items, {
            offset: current.start,
            length: token.loc.offset + 1 - current.start,
          }),
        );
        break;
      }
      default: {
        const leaf = parseLeaf(token, issuer);
        if (!leaf.success) {
          return leaf;
        }
        current.items.push(leaf.value);
      }
    }
  }

  if (stack.length > 1) {
    const unclosed = stack[stack.length - 1];
    return Result.err(
      new ParseError(ParseErrorCode.UNCLOSED_LIST, undefined, {
        offset: unclosed.start,
        length: 1,
      }),
    );
  }

  const expressions = stack[0].items;
  const identified = identify(expressions);
  if (!identified.success) {
    return identified;
  }
  return Result.ok(expressions);
}

function parseLeaf(
  token: Exclude<Token, { kind: "open" } | { kind: "close" }>,
  issuer: string,
): Result<Expression, ParseError> {
  const { loc } = token;

  switch (token.kind) {
    case "atom":
      return Result.ok(Build.atom(token.name, loc));

    case "trait-reference":
      return Result.ok(Build.traitReference(token.name, loc));

    case "int":
    case "uint": {
      const value = BigInt(token.text);
      const [min, max] =
        token.kind === "int" ? [INT_MIN, INT_MAX] : [0n, UINT_MAX];
      if (value < min || value > max) {
        return Result.err(
          new ParseError(ParseErrorCode.INTEGER_OUT_OF_RANGE, token.text, loc),
        );
      }
      return Result.ok(Build.value({ kind: token.kind, value }, loc));
    }

    case "string":
      return Result.ok(
        Build.value(
          { kind: "buffer", bytes: new TextEncoder().encode(token.value) },
          loc,
        ),
      );

    case "hex": {
      if (token.text.length % 2 !== 0) {
        return Result.err(
          new ParseError(ParseErrorCode.INVALID_BUFFER, undefined, loc),
        );
      }
      const bytes = new Uint8Array(token.text.length / 2);
      for (let i = 0; i < bytes.length; i++) {
        bytes[i] = parseInt(token.text.slice(i * 2, i * 2 + 2), 16);
      }
      return Result.ok(Build.value({ kind: "buffer", bytes }, loc));
    }

    case "principal":
      return principalOrField(token.text, loc);

    case "relative":
      return principalOrField(`${issuer}.${token.text}`, loc);
  }
}

/**
 * `ISSUER`, `ISSUER.contract` or `ISSUER.contract.trait`
 */
function principalOrField(
  text: string,
  loc: SourceLocation,
): Result<Expression, ParseError> {
  const [issuer, contract, trait] = text.split(".");
  if (
    !isIssuer(issuer) ||
    (contract !== undefined && !isContractName(contract))
  ) {
    return Result.err(
      new ParseError(ParseErrorCode.INVALID_PRINCIPAL, text, loc),
    );
  }

  if (contract !== undefined && trait !== undefined) {
    const contractIdentifier = new QualifiedContractIdentifier(
      issuer,
      contract,
    );
    return Result.ok(
      Build.field(new TraitIdentifier(contractIdentifier, trait), loc),
    );
  }

  const value: Value =
    contract === undefined
      ? { kind: "principal", issuer }
      : { kind: "principal", issuer, contract };
  return Result.ok(Build.value(value, loc));
}
