/**
 * Asset and token primitives
 *
 * Every handler validates, in order: the argument count, that the first
 * argument is a literal asset name, that the name is declared in the
 * contract's asset schema, then charges the lookup of the asset's type
 * before checking the remaining arguments in order.
 */

import { Expression } from "#ast";
import { CostFunction } from "#costs";
import { Result } from "#result";
import { Type } from "#types";

import { CheckErrors, type CheckError } from "../../errors.js";
import type { TypeChecker } from "../checker.js";
import type { TypingContext } from "../context.js";
import { checkArgumentCount } from "../functions.js";

import type { SpecialHandler } from "./handler.js";

const transferResult = Type.response(Type.bool, Type.uint);

/**
 * Identifier type of the non-fungible asset that `args[0]` names
 */
function lookupNft(
  checker: TypeChecker,
  args: Expression[],
): Result<Type, CheckError> {
  const [nameExpr] = args;
  const name = Expression.matchAtom(nameExpr);
  if (name === undefined) {
    return Result.err(CheckErrors.badTokenName().at(nameExpr.loc));
  }

  const type = checker.analysis.getNftType(name);
  if (!type) {
    return Result.err(CheckErrors.noSuchNft(name).at(nameExpr.loc));
  }

  const charge = checker.meter(CostFunction.ANALYSIS_TYPE_LOOKUP, type.size());
  if (!charge.success) {
    return charge;
  }
  return Result.ok(type);
}

function lookupFt(
  checker: TypeChecker,
  args: Expression[],
): Result<void, CheckError> {
  const [nameExpr] = args;
  const name = Expression.matchAtom(nameExpr);
  if (name === undefined) {
    return Result.err(CheckErrors.badTokenName().at(nameExpr.loc));
  }

  if (!checker.analysis.ftExists(name)) {
    return Result.err(CheckErrors.noSuchFt(name).at(nameExpr.loc));
  }

  // tokens carry no identifier type
  return checker.meter(CostFunction.ANALYSIS_TYPE_LOOKUP, 1);
}

/**
 * Checks `args` against `expected` pairwise, in order
 */
function expectAll(
  checker: TypeChecker,
  args: Expression[],
  expected: Type[],
  context: TypingContext,
): Result<void, CheckError> {
  for (let i = 0; i < expected.length; i++) {
    const checked = checker.typeCheckExpects(args[i], context, expected[i]);
    if (!checked.success) {
      return checked;
    }
  }
  return Result.ok(undefined);
}

/** `(nft-get-owner? asset-name asset-identifier)` */
export const checkSpecialGetOwner: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }

  const assetType = lookupNft(checker, args);
  if (!assetType.success) {
    return assetType;
  }

  const checked = expectAll(checker, args.slice(1), [assetType.value], context);
  return Result.map(checked, () => Type.optional(Type.principal));
};

/** `(ft-get-balance token-name owner)` */
export const checkSpecialGetBalance: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }

  const token = lookupFt(checker, args);
  if (!token.success) {
    return token;
  }

  const checked = expectAll(checker, args.slice(1), [Type.principal], context);
  return Result.map(checked, () => Type.uint);
};

/** `(nft-mint? asset-name asset-identifier recipient)` */
export const checkSpecialMintAsset: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentCount(3, args);
  if (!count.success) {
    return count;
  }

  const assetType = lookupNft(checker, args);
  if (!assetType.success) {
    return assetType;
  }

  const checked = expectAll(
    checker,
    args.slice(1),
    [assetType.value, Type.principal],
    context,
  );
  return Result.map(checked, () => transferResult);
};

/** `(ft-mint? token-name amount recipient)` */
export const checkSpecialMintToken: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentCount(3, args);
  if (!count.success) {
    return count;
  }

  const token = lookupFt(checker, args);
  if (!token.success) {
    return token;
  }

  const checked = expectAll(
    checker,
    args.slice(1),
    [Type.uint, Type.principal],
    context,
  );
  return Result.map(checked, () => transferResult);
};

/** `(nft-transfer? asset-name asset-identifier sender recipient)` */
export const checkSpecialTransferAsset: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentCount(4, args);
  if (!count.success) {
    return count;
  }

  const assetType = lookupNft(checker, args);
  if (!assetType.success) {
    return assetType;
  }

  const checked = expectAll(
    checker,
    args.slice(1),
    [assetType.value, Type.principal, Type.principal],
    context,
  );
  return Result.map(checked, () => transferResult);
};

/** `(ft-transfer? token-name amount sender recipient)` */
export const checkSpecialTransferToken: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentCount(4, args);
  if (!count.success) {
    return count;
  }

  const token = lookupFt(checker, args);
  if (!token.success) {
    return token;
  }

  const checked = expectAll(
    checker,
    args.slice(1),
    [Type.uint, Type.principal, Type.principal],
    context,
  );
  return Result.map(checked, () => transferResult);
};

export const assetHandlers: Record<string, SpecialHandler> = {
  "nft-get-owner?": checkSpecialGetOwner,
  "ft-get-balance": checkSpecialGetBalance,
  "nft-mint?": checkSpecialMintAsset,
  "ft-mint?": checkSpecialMintToken,
  "nft-transfer?": checkSpecialTransferAsset,
  "ft-transfer?": checkSpecialTransferToken,
};
