/**
 * Errors reported by contract analysis passes
 */

import { AnalysisError } from "#errors";
import type { SourceLocation } from "#ast";
import type { TraitIdentifier, Type } from "#types";

export enum CheckErrorCode {
  // unresolved references
  TRAIT_REFERENCE_UNKNOWN = "CHECK001",
  NO_SUCH_CONTRACT = "CHECK002",
  TRAIT_METHOD_UNKNOWN = "CHECK003",
  NO_SUCH_PUBLIC_FUNCTION = "CHECK004",
  UNKNOWN_FUNCTION = "CHECK005",
  UNDEFINED_VARIABLE = "CHECK006",
  NO_SUCH_MAP = "CHECK007",
  NO_SUCH_DATA_VARIABLE = "CHECK008",

  // name collisions
  NAME_ALREADY_USED = "CHECK010",
  DEFINE_TRAIT_DUPLICATE_METHOD = "CHECK011",

  BAD_TRAIT_IMPLEMENTATION = "CHECK020",

  // assets
  NO_SUCH_NFT = "CHECK030",
  NO_SUCH_FT = "CHECK031",
  BAD_TOKEN_NAME = "CHECK032",

  // typing
  TYPE_ERROR = "CHECK040",
  INCORRECT_ARGUMENT_COUNT = "CHECK041",
  PUBLIC_FUNCTION_MUST_RETURN_RESPONSE = "CHECK042",
  TRAIT_REFERENCE_NOT_ALLOWED = "CHECK043",
  CONTRACT_CALL_EXPECT_NAME = "CHECK044",
  BAD_SYNTAX = "CHECK045",
  TYPE_SIGNATURE_TOO_DEEP = "CHECK046",
  NO_SUCH_TUPLE_FIELD = "CHECK047",

  CIRCULAR_REFERENCE = "CHECK050",

  // resources
  COST_BALANCE_EXCEEDED = "CHECK060",
  COST_OVERFLOW = "CHECK061",

  CONTRACT_ALREADY_EXISTS = "CHECK070",
}

export const CheckErrorMessages = {
  TRAIT_REFERENCE_UNKNOWN: (name: string) =>
    `Use of undeclared trait <${name}>`,
  NO_SUCH_CONTRACT: (contract: string) =>
    `Use of unresolved contract '${contract}'`,
  TRAIT_METHOD_UNKNOWN: (trait: string, method: string) =>
    `Method '${method}' unspecified in trait <${trait}>`,
  NO_SUCH_PUBLIC_FUNCTION: (contract: string, fn: string) =>
    `Contract '${contract}' has no public function '${fn}'`,
  UNKNOWN_FUNCTION: (name: string) => `Use of unresolved function '${name}'`,
  UNDEFINED_VARIABLE: (name: string) => `Use of unresolved variable '${name}'`,
  NO_SUCH_MAP: (name: string) => `Use of unresolved map '${name}'`,
  NO_SUCH_DATA_VARIABLE: (name: string) =>
    `Use of unresolved persisted variable '${name}'`,
  NAME_ALREADY_USED: (name: string) =>
    `Defining '${name}' conflicts with previous value`,
  DEFINE_TRAIT_DUPLICATE_METHOD: (method: string) =>
    `Duplicate method name '${method}' in trait definition`,
  BAD_TRAIT_IMPLEMENTATION: (trait: string, method: string) =>
    `Invalid implementation of trait <${trait}>: method '${method}' does not match`,
  NO_SUCH_NFT: (name: string) =>
    `Tried to use asset function with an undefined asset ('${name}')`,
  NO_SUCH_FT: (name: string) =>
    `Tried to use token function with an undefined token ('${name}')`,
  BAD_TOKEN_NAME: () => "Expecting an asset name as an argument",
  TYPE_ERROR: (expected: string, actual: string) =>
    `Expecting expression of type '${expected}', found '${actual}'`,
  TRAIT_TYPE_ERROR: (
    expected: string,
    expectedTrait: string,
    actual: string,
    actualTrait: string,
  ) =>
    `Expecting expression of type '${expected}' (${expectedTrait}), ` +
    `found '${actual}' (${actualTrait})`,
  UNION_TYPE_ERROR: (expected: string[], actual: string) =>
    `Expecting expression of any of the types ${expected
      .map((type) => `'${type}'`)
      .join(", ")}, found '${actual}'`,
  INCORRECT_ARGUMENT_COUNT: (expected: number, actual: number) =>
    `Expecting ${expected} arguments, got ${actual}`,
  PUBLIC_FUNCTION_MUST_RETURN_RESPONSE: (actual: string) =>
    `Public functions must return an expression of type 'response', found '${actual}'`,
  TRAIT_REFERENCE_NOT_ALLOWED: () =>
    "Trait references can only be used as function parameters",
  CONTRACT_CALL_EXPECT_NAME: () =>
    "Missing contract name for call",
  BAD_SYNTAX: (detail: string) => `Invalid syntax: ${detail}`,
  TYPE_SIGNATURE_TOO_DEEP: (limit: number) =>
    `Type signature nesting exceeds the limit of ${limit}`,
  NO_SUCH_TUPLE_FIELD: (field: string, tuple: string) =>
    `Cannot find field '${field}' in tuple '${tuple}'`,
  CIRCULAR_REFERENCE: (names: string[]) =>
    `Detected interdependent functions (${names.join(", ")})`,
  COST_BALANCE_EXCEEDED: (total: number, limit: number) =>
    `Analysis cost ${total} exceeds the budget of ${limit}`,
  COST_OVERFLOW: () => "Analysis cost overflowed",
  CONTRACT_ALREADY_EXISTS: (contract: string) =>
    `Contract '${contract}' has already been analyzed`,
};

export interface CheckErrorDetails {
  /** Names involved in the failure: traits, methods, assets, definitions */
  names?: string[];
  expected?: Type;
  actual?: Type;
}

export class CheckError extends AnalysisError {
  public readonly names: string[];
  public readonly expected?: Type;
  public readonly actual?: Type;

  constructor(
    code: CheckErrorCode,
    message: string,
    details: CheckErrorDetails = {},
    location?: SourceLocation,
  ) {
    super(message, code, location);
    this.names = details.names ?? [];
    this.expected = details.expected;
    this.actual = details.actual;
  }

  /**
   * Attaches the location of the failing expression, keeping the innermost
   * one when several expressions are unwound through
   */
  at(location: SourceLocation | null | undefined): this {
    if (!this.location && location) {
      this.location = location;
    }
    return this;
  }
}

/**
 * Constructors for every kind of check error
 */
export const CheckErrors = {
  traitReferenceUnknown: (name: string) =>
    new CheckError(
      CheckErrorCode.TRAIT_REFERENCE_UNKNOWN,
      CheckErrorMessages.TRAIT_REFERENCE_UNKNOWN(name),
      { names: [name] },
    ),

  noSuchContract: (contract: string) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_CONTRACT,
      CheckErrorMessages.NO_SUCH_CONTRACT(contract),
      { names: [contract] },
    ),

  traitMethodUnknown: (trait: string, method: string) =>
    new CheckError(
      CheckErrorCode.TRAIT_METHOD_UNKNOWN,
      CheckErrorMessages.TRAIT_METHOD_UNKNOWN(trait, method),
      { names: [trait, method] },
    ),

  noSuchPublicFunction: (contract: string, fn: string) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_PUBLIC_FUNCTION,
      CheckErrorMessages.NO_SUCH_PUBLIC_FUNCTION(contract, fn),
      { names: [contract, fn] },
    ),

  unknownFunction: (name: string) =>
    new CheckError(
      CheckErrorCode.UNKNOWN_FUNCTION,
      CheckErrorMessages.UNKNOWN_FUNCTION(name),
      { names: [name] },
    ),

  undefinedVariable: (name: string) =>
    new CheckError(
      CheckErrorCode.UNDEFINED_VARIABLE,
      CheckErrorMessages.UNDEFINED_VARIABLE(name),
      { names: [name] },
    ),

  noSuchMap: (name: string) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_MAP,
      CheckErrorMessages.NO_SUCH_MAP(name),
      { names: [name] },
    ),

  noSuchDataVariable: (name: string) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_DATA_VARIABLE,
      CheckErrorMessages.NO_SUCH_DATA_VARIABLE(name),
      { names: [name] },
    ),

  nameAlreadyUsed: (name: string) =>
    new CheckError(
      CheckErrorCode.NAME_ALREADY_USED,
      CheckErrorMessages.NAME_ALREADY_USED(name),
      { names: [name] },
    ),

  defineTraitDuplicateMethod: (method: string) =>
    new CheckError(
      CheckErrorCode.DEFINE_TRAIT_DUPLICATE_METHOD,
      CheckErrorMessages.DEFINE_TRAIT_DUPLICATE_METHOD(method),
      { names: [method] },
    ),

  badTraitImplementation: (trait: string, method: string) =>
    new CheckError(
      CheckErrorCode.BAD_TRAIT_IMPLEMENTATION,
      CheckErrorMessages.BAD_TRAIT_IMPLEMENTATION(trait, method),
      { names: [trait, method] },
    ),

  noSuchNft: (name: string) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_NFT,
      CheckErrorMessages.NO_SUCH_NFT(name),
      { names: [name] },
    ),

  noSuchFt: (name: string) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_FT,
      CheckErrorMessages.NO_SUCH_FT(name),
      { names: [name] },
    ),

  badTokenName: () =>
    new CheckError(
      CheckErrorCode.BAD_TOKEN_NAME,
      CheckErrorMessages.BAD_TOKEN_NAME(),
    ),

  typeError: (expected: Type, actual: Type) =>
    new CheckError(
      CheckErrorCode.TYPE_ERROR,
      CheckErrorMessages.TYPE_ERROR(expected.toString(), actual.toString()),
      { expected, actual },
    ),

  /**
   * Trait references that resolve to different traits, or fail to resolve
   */
  traitTypeError: (
    expected: Type,
    expectedTrait: TraitIdentifier | undefined,
    actual: Type,
    actualTrait: TraitIdentifier | undefined,
  ) =>
    new CheckError(
      CheckErrorCode.TYPE_ERROR,
      CheckErrorMessages.TRAIT_TYPE_ERROR(
        expected.toString(),
        expectedTrait?.toString() ?? "unresolved",
        actual.toString(),
        actualTrait?.toString() ?? "unresolved",
      ),
      { expected, actual },
    ),

  unionTypeError: (expected: Type[], actual: Type) =>
    new CheckError(
      CheckErrorCode.TYPE_ERROR,
      CheckErrorMessages.UNION_TYPE_ERROR(
        expected.map((type) => type.toString()),
        actual.toString(),
      ),
      { actual },
    ),

  incorrectArgumentCount: (expected: number, actual: number) =>
    new CheckError(
      CheckErrorCode.INCORRECT_ARGUMENT_COUNT,
      CheckErrorMessages.INCORRECT_ARGUMENT_COUNT(expected, actual),
    ),

  publicFunctionMustReturnResponse: (actual: Type) =>
    new CheckError(
      CheckErrorCode.PUBLIC_FUNCTION_MUST_RETURN_RESPONSE,
      CheckErrorMessages.PUBLIC_FUNCTION_MUST_RETURN_RESPONSE(
        actual.toString(),
      ),
      { actual },
    ),

  traitReferenceNotAllowed: () =>
    new CheckError(
      CheckErrorCode.TRAIT_REFERENCE_NOT_ALLOWED,
      CheckErrorMessages.TRAIT_REFERENCE_NOT_ALLOWED(),
    ),

  contractCallExpectName: () =>
    new CheckError(
      CheckErrorCode.CONTRACT_CALL_EXPECT_NAME,
      CheckErrorMessages.CONTRACT_CALL_EXPECT_NAME(),
    ),

  badSyntax: (detail: string) =>
    new CheckError(
      CheckErrorCode.BAD_SYNTAX,
      CheckErrorMessages.BAD_SYNTAX(detail),
    ),

  typeSignatureTooDeep: (limit: number) =>
    new CheckError(
      CheckErrorCode.TYPE_SIGNATURE_TOO_DEEP,
      CheckErrorMessages.TYPE_SIGNATURE_TOO_DEEP(limit),
    ),

  noSuchTupleField: (field: string, tuple: Type) =>
    new CheckError(
      CheckErrorCode.NO_SUCH_TUPLE_FIELD,
      CheckErrorMessages.NO_SUCH_TUPLE_FIELD(field, tuple.toString()),
      { names: [field], actual: tuple },
    ),

  circularReference: (names: string[]) =>
    new CheckError(
      CheckErrorCode.CIRCULAR_REFERENCE,
      CheckErrorMessages.CIRCULAR_REFERENCE(names),
      { names },
    ),

  costBalanceExceeded: (total: number, limit: number) =>
    new CheckError(
      CheckErrorCode.COST_BALANCE_EXCEEDED,
      CheckErrorMessages.COST_BALANCE_EXCEEDED(total, limit),
    ),

  costOverflow: () =>
    new CheckError(
      CheckErrorCode.COST_OVERFLOW,
      CheckErrorMessages.COST_OVERFLOW(),
    ),

  contractAlreadyExists: (contract: string) =>
    new CheckError(
      CheckErrorCode.CONTRACT_ALREADY_EXISTS,
      CheckErrorMessages.CONTRACT_ALREADY_EXISTS(contract),
      { names: [contract] },
    ),
};
