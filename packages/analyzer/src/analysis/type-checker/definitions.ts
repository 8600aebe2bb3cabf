/**
 * Top-level definitions
 */

import { Expression } from "#ast";
import { CostFunction } from "#costs";
import { Result } from "#result";
import { FunctionType, Type } from "#types";

import { CheckErrors, type CheckError } from "../errors.js";

import type { TypeChecker } from "./checker.js";
import { TypingContext } from "./context.js";
import { checkArgumentCount } from "./functions.js";
import { parseFunctionArgs, parseTypeSignature } from "./signatures.js";
import { traitHandlers } from "./traits.js";

/**
 * Checks one top-level definition and records it in the contract's
 * analysis. Receives the form's arguments (without its head) and the
 * whole form.
 */
export type DefineHandler = (
  checker: TypeChecker,
  args: Expression[],
  expr: Expression,
) => Result<void, CheckError>;

function matchNewName(
  checker: TypeChecker,
  expr: Expression,
): Result<string, CheckError> {
  const name = Expression.matchAtom(expr);
  if (name === undefined) {
    return Result.err(CheckErrors.badSyntax("expected a name").at(expr.loc));
  }
  return Result.map(checker.checkNameUnused(name, expr.loc), () => name);
}

/** `(define-constant name value)` */
export const checkDefineConstant: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const name = matchNewName(checker, args[0]);
  if (!name.success) {
    return name;
  }

  const type = checker.typeCheck(args[1], TypingContext.root());
  if (!type.success) {
    return type;
  }
  const stored = checker.checkNoTraitReference(type.value, args[1].loc);
  if (!stored.success) {
    return stored;
  }
  checker.analysis.addVariableType(name.value, type.value);
  return Result.ok(undefined);
};

/** `(define-data-var name type initial-value)` */
export const checkDefineDataVar: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(3, args);
  if (!count.success) {
    return count;
  }
  const name = matchNewName(checker, args[0]);
  if (!name.success) {
    return name;
  }

  const type = parseTypeSignature(args[1]);
  if (!type.success) {
    return type;
  }
  const initial = checker.typeCheckExpects(
    args[2],
    TypingContext.root(),
    type.value,
  );
  if (!initial.success) {
    return initial;
  }
  checker.analysis.addPersistedVariableType(name.value, type.value);
  return Result.ok(undefined);
};

/** `(define-map name key-type value-type)` */
export const checkDefineMap: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(3, args);
  if (!count.success) {
    return count;
  }
  const name = matchNewName(checker, args[0]);
  if (!name.success) {
    return name;
  }

  const keyType = parseTypeSignature(args[1]);
  if (!keyType.success) {
    return keyType;
  }
  const valueType = parseTypeSignature(args[2]);
  if (!valueType.success) {
    return valueType;
  }
  checker.analysis.addMapType(name.value, keyType.value, valueType.value);
  return Result.ok(undefined);
};

/** `(define-fungible-token name [total-supply])` */
export const checkDefineFungibleToken: DefineHandler = (checker, args) => {
  if (args.length !== 1 && args.length !== 2) {
    return Result.err(CheckErrors.incorrectArgumentCount(1, args.length));
  }
  const name = matchNewName(checker, args[0]);
  if (!name.success) {
    return name;
  }

  if (args.length === 2) {
    const supply = checker.typeCheckExpects(
      args[1],
      TypingContext.root(),
      Type.uint,
    );
    if (!supply.success) {
      return supply;
    }
  }
  checker.analysis.addFungibleToken(name.value);
  return Result.ok(undefined);
};

/** `(define-non-fungible-token name identifier-type)` */
export const checkDefineNonFungibleToken: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const name = matchNewName(checker, args[0]);
  if (!name.success) {
    return name;
  }

  const type = parseTypeSignature(args[1]);
  if (!type.success) {
    return type;
  }
  checker.analysis.addNonFungibleToken(name.value, type.value);
  return Result.ok(undefined);
};

type Visibility = "public" | "private" | "read-only";

/**
 * `(define-<visibility> (name (arg type) ...) body)`
 */
const checkDefineFunction =
  (visibility: Visibility): DefineHandler =>
  (checker, args) => {
    const count = checkArgumentCount(2, args);
    if (!count.success) {
      return count;
    }
    const [signatureExpr, body] = args;
    const { analysis } = checker;

    const signature = Expression.matchList(signatureExpr);
    if (!signature || signature.length === 0) {
      return Result.err(
        CheckErrors.badSyntax("expected (<name> (<arg> <type>) ...)").at(
          signatureExpr.loc,
        ),
      );
    }
    const [nameExpr, ...argExprs] = signature;

    const name = matchNewName(checker, nameExpr);
    if (!name.success) {
      return name;
    }

    const fnArgs = parseFunctionArgs(argExprs);
    if (!fnArgs.success) {
      return fnArgs;
    }
    for (const [index, arg] of fnArgs.value.entries()) {
      const loc = argExprs[index].loc;
      const unused = checker.checkNameUnused(arg.name, loc);
      if (!unused.success) {
        return unused;
      }
      if (
        Type.isTraitReference(arg.signature) &&
        !analysis.resolveTrait(arg.signature.alias)
      ) {
        return Result.err(
          CheckErrors.traitReferenceUnknown(arg.signature.alias).at(loc),
        );
      }
    }

    const context = TypingContext.root().extend(
      fnArgs.value.map((arg): [string, Type] => [arg.name, arg.signature]),
    );
    const returns = checker.typeCheck(body, context);
    if (!returns.success) {
      return returns;
    }
    const returned = checker.checkNoTraitReference(returns.value, body.loc);
    if (!returned.success) {
      return returned;
    }

    const charge = checker.meter(
      CostFunction.ANALYSIS_TYPE_CHECK,
      returns.value.size(),
    );
    if (!charge.success) {
      return charge;
    }

    const type = FunctionType.fixed(fnArgs.value, returns.value);
    switch (visibility) {
      case "public":
        if (!Type.isResponse(returns.value)) {
          return Result.err(
            CheckErrors.publicFunctionMustReturnResponse(returns.value).at(
              body.loc,
            ),
          );
        }
        analysis.addPublicFunction(name.value, type);
        break;
      case "read-only":
        analysis.addReadOnlyFunction(name.value, type);
        break;
      case "private":
        analysis.addPrivateFunction(name.value, type);
        break;
    }
    return Result.ok(undefined);
  };

export const defineHandlers: ReadonlyMap<string, DefineHandler> = new Map(
  Object.entries({
    "define-constant": checkDefineConstant,
    "define-data-var": checkDefineDataVar,
    "define-map": checkDefineMap,
    "define-fungible-token": checkDefineFungibleToken,
    "define-non-fungible-token": checkDefineNonFungibleToken,
    "define-public": checkDefineFunction("public"),
    "define-private": checkDefineFunction("private"),
    "define-read-only": checkDefineFunction("read-only"),
    ...traitHandlers,
  }),
);
