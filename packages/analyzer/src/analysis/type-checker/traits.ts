/**
 * `define-trait`, `use-trait` and `impl-trait`
 */

import { Expression } from "#ast";
import { Result } from "#result";
import { Type, TraitIdentifier, type FunctionSignature } from "#types";

import type {
  ContractAnalysis,
  TraitDefinition,
} from "../contract-analysis.js";
import { CheckErrors, type CheckError } from "../errors.js";

import type { TypeChecker } from "./checker.js";
import type { DefineHandler } from "./definitions.js";
import { checkArgumentCount } from "./functions.js";
import { parseTypeSignature } from "./signatures.js";

/**
 * `(define-trait name ((method (arg-type ...) return-type) ...))`
 */
export const checkDefineTrait: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const [nameExpr, methodsExpr] = args;
  const { analysis } = checker;

  const name = Expression.matchAtom(nameExpr);
  if (name === undefined) {
    return Result.err(
      CheckErrors.badSyntax("expected a trait name").at(nameExpr.loc),
    );
  }
  if (analysis.isTraitNameUsed(name)) {
    return Result.err(CheckErrors.nameAlreadyUsed(name).at(nameExpr.loc));
  }

  const methodExprs = Expression.matchList(methodsExpr);
  if (!methodExprs) {
    return Result.err(
      CheckErrors.badSyntax("expected a list of methods").at(methodsExpr.loc),
    );
  }

  const definition: TraitDefinition = new Map();
  const referenced: TraitIdentifier[] = [];

  for (const methodExpr of methodExprs) {
    const method = parseMethod(methodExpr);
    if (!method.success) {
      return method;
    }
    const [methodName, signature] = method.value;

    if (definition.has(methodName)) {
      return Result.err(
        CheckErrors.defineTraitDuplicateMethod(methodName).at(methodExpr.loc),
      );
    }

    for (const argType of signature.args) {
      if (!Type.isTraitReference(argType)) {
        continue;
      }
      if (argType.alias === name) {
        return Result.err(
          CheckErrors.circularReference([name]).at(methodExpr.loc),
        );
      }
      const trait = analysis.resolveTrait(argType.alias);
      if (!trait) {
        return Result.err(
          CheckErrors.traitReferenceUnknown(argType.alias).at(methodExpr.loc),
        );
      }
      referenced.push(trait);
    }

    definition.set(methodName, signature);
  }

  const self = new TraitIdentifier(analysis.contractIdentifier, name);
  if (reachesTrait(checker, referenced, self)) {
    return Result.err(CheckErrors.circularReference([name]));
  }

  analysis.addDefinedTrait(name, definition);
  return Result.ok(undefined);
};

/**
 * `(method (arg-type ...) return-type)`
 */
function parseMethod(
  expr: Expression,
): Result<[string, FunctionSignature], CheckError> {
  const malformed = () =>
    Result.err(
      CheckErrors.badSyntax(
        "expected (<method> (<argument type> ...) <return type>)",
      ).at(expr.loc),
    );

  const items = Expression.matchList(expr);
  if (!items || items.length !== 3) {
    return malformed();
  }
  const [nameExpr, argsExpr, returnExpr] = items;

  const name = Expression.matchAtom(nameExpr);
  const argExprs = Expression.matchList(argsExpr);
  if (name === undefined || !argExprs) {
    return malformed();
  }

  const args: Type[] = [];
  for (const argExpr of argExprs) {
    const type = parseTypeSignature(argExpr, { allowTraitReference: true });
    if (!type.success) {
      return type;
    }
    args.push(type.value);
  }

  const returns = parseTypeSignature(returnExpr);
  if (!returns.success) {
    return returns;
  }
  const method: [string, FunctionSignature] = [
    name,
    { args, returns: returns.value },
  ];
  return Result.ok(method);
}

/**
 * Whether `target` is reachable from `start` through trait-typed method
 * arguments, following traits across contracts.
 *
 * Each trait is visited at most once; links into contracts that are not
 * (yet) analyzed are not followed.
 */
function reachesTrait(
  checker: TypeChecker,
  start: TraitIdentifier[],
  target: TraitIdentifier,
): boolean {
  const visited = new Set<string>();
  const pending = [...start];

  for (let trait = pending.pop(); trait; trait = pending.pop()) {
    if (trait.equals(target)) {
      return true;
    }
    const key = trait.toString();
    if (visited.has(key)) {
      continue;
    }
    visited.add(key);

    const owner = loadDefiningContract(checker, trait);
    const definition = owner?.getDefinedTrait(trait.name);
    if (!owner || !definition) {
      continue;
    }

    for (const signature of definition.values()) {
      for (const argType of signature.args) {
        if (!Type.isTraitReference(argType)) {
          continue;
        }
        const next = owner.resolveTrait(argType.alias);
        if (next) {
          pending.push(next);
        }
      }
    }
  }
  return false;
}

function loadDefiningContract(
  checker: TypeChecker,
  trait: TraitIdentifier,
): ContractAnalysis | undefined {
  const { analysis, db } = checker;
  if (trait.contractIdentifier.equals(analysis.contractIdentifier)) {
    return analysis;
  }
  return db.loadContract(trait.contractIdentifier);
}

/**
 * Resolves `.contract.trait` through the stored analysis of `contract`,
 * giving the identity of the trait where it was originally defined
 */
function resolveTraitField(
  checker: TypeChecker,
  expr: Expression,
): Result<TraitIdentifier, CheckError> {
  if (!Expression.isField(expr)) {
    return Result.err(
      CheckErrors.badSyntax("expected a trait identifier").at(expr.loc),
    );
  }
  const { contractIdentifier, name } = expr.trait;

  const contract = checker.db.loadContract(contractIdentifier);
  if (!contract) {
    return Result.err(
      CheckErrors.noSuchContract(contractIdentifier.toString()).at(expr.loc),
    );
  }

  const trait = contract.resolveTrait(name);
  if (!trait) {
    return Result.err(CheckErrors.traitReferenceUnknown(name).at(expr.loc));
  }
  return Result.ok(trait);
}

/**
 * `(use-trait alias .contract.trait)`
 */
export const checkUseTrait: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(2, args);
  if (!count.success) {
    return count;
  }
  const [aliasExpr, traitExpr] = args;

  const alias = Expression.matchAtom(aliasExpr);
  if (alias === undefined) {
    return Result.err(
      CheckErrors.badSyntax("expected a trait alias").at(aliasExpr.loc),
    );
  }
  if (checker.analysis.isTraitNameUsed(alias)) {
    return Result.err(CheckErrors.nameAlreadyUsed(alias).at(aliasExpr.loc));
  }

  const trait = resolveTraitField(checker, traitExpr);
  if (!trait.success) {
    return trait;
  }
  checker.analysis.addReferencedTrait(alias, trait.value);
  return Result.ok(undefined);
};

/**
 * `(impl-trait .contract.trait)`
 */
export const checkImplTrait: DefineHandler = (checker, args) => {
  const count = checkArgumentCount(1, args);
  if (!count.success) {
    return count;
  }

  const trait = resolveTraitField(checker, args[0]);
  if (!trait.success) {
    return trait;
  }
  checker.analysis.addImplementedTrait(trait.value);
  return Result.ok(undefined);
};

export const traitHandlers: Record<string, DefineHandler> = {
  "define-trait": checkDefineTrait,
  "use-trait": checkUseTrait,
  "impl-trait": checkImplTrait,
};
