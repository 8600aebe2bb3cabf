/**
 * Type checker for contract source
 *
 * Walks the top-level forms in definition order, recording every
 * declaration in the contract's analysis record and the type of every
 * expression in its type map.
 */

import { Expression, type SourceLocation, type Value } from "#ast";
import type { CostFunction, CostTracker } from "#costs";
import { Result } from "#result";
import { Type, type FunctionType, type TypeMap } from "#types";

import type { ContractAnalysis } from "../contract-analysis.js";
import type { AnalysisDatabase } from "../database.js";
import { CheckErrors, type CheckError } from "../errors.js";
import type { AnalysisPass } from "../pass.js";

import { TypingContext } from "./context.js";
import { defineHandlers } from "./definitions.js";
import {
  checkArgumentCount,
  checkArgumentsByFunctionType,
} from "./functions.js";
import {
  defineForms,
  isReservedName,
  nativeFunctions,
  reservedVariables,
  specialHandlers,
} from "./natives/index.js";

export class TypeChecker {
  readonly typeMap: TypeMap = new Map();

  constructor(
    readonly analysis: ContractAnalysis,
    readonly db: AnalysisDatabase,
    readonly costTracker: CostTracker,
  ) {}

  /**
   * Checks every top-level form; on success the record holds the
   * contract's declarations and its type map
   */
  run(): Result<void, CheckError> {
    for (const expr of this.analysis.expressionsInOrder()) {
      const checked = this.checkTopLevel(expr);
      if (!checked.success) {
        return checked;
      }
    }
    this.analysis.typeMap = this.typeMap;
    return Result.ok(undefined);
  }

  private checkTopLevel(expr: Expression): Result<void, CheckError> {
    const items = Expression.matchList(expr) ?? [];
    const name = items.length > 0 ? Expression.matchAtom(items[0]) : undefined;
    const define = name === undefined ? undefined : defineHandlers.get(name);

    if (!define) {
      const type = this.typeCheck(expr, TypingContext.root());
      return Result.map(type, () => undefined);
    }

    const defined = define(this, items.slice(1), expr);
    if (!defined.success) {
      Result.firstError(defined)?.at(expr.loc);
    }
    return defined;
  }

  /**
   * Infers the type of `expr` and records it in the type map
   */
  typeCheck(
    expr: Expression,
    context: TypingContext,
  ): Result<Type, CheckError> {
    const result = this.inferType(expr, context);
    if (!result.success) {
      Result.firstError(result)?.at(expr.loc);
      return result;
    }
    this.typeMap.set(expr.id, result.value);
    return result;
  }

  typeCheckAll(
    exprs: Expression[],
    context: TypingContext,
  ): Result<Type[], CheckError> {
    const types: Type[] = [];
    for (const expr of exprs) {
      const type = this.typeCheck(expr, context);
      if (!type.success) {
        return type;
      }
      types.push(type.value);
    }
    return Result.ok(types);
  }

  /**
   * Checks that `expr` has a type admitted by `expected`.
   *
   * `owner` is the contract whose trait namespace `expected` was declared
   * in; it differs from the contract being checked for calls into other
   * contracts.
   */
  typeCheckExpects(
    expr: Expression,
    context: TypingContext,
    expected: Type,
    owner: ContractAnalysis = this.analysis,
  ): Result<void, CheckError> {
    const actual = this.typeCheck(expr, context);
    if (!actual.success) {
      return actual;
    }
    if (!this.admitsIn(expected, owner, actual.value)) {
      return Result.err(
        this.mismatch(expected, owner, actual.value).at(expr.loc),
      );
    }
    return Result.ok(undefined);
  }

  private mismatch(
    expected: Type,
    owner: ContractAnalysis,
    actual: Type,
  ): CheckError {
    if (Type.isTraitReference(expected) && Type.isTraitReference(actual)) {
      return CheckErrors.traitTypeError(
        expected,
        owner.resolveTrait(expected.alias),
        actual,
        this.analysis.resolveTrait(actual.alias),
      );
    }
    return CheckErrors.typeError(expected, actual);
  }

  /**
   * Admission across trait namespaces. Trait references are compared by
   * the identity of the traits they resolve to, `expected` in `owner` and
   * `actual` in the contract being checked; every other pair structurally.
   */
  admitsIn(expected: Type, owner: ContractAnalysis, actual: Type): boolean {
    if (Type.isTraitReference(expected) || Type.isTraitReference(actual)) {
      if (!Type.isTraitReference(expected) || !Type.isTraitReference(actual)) {
        return false;
      }
      const expectedTrait = owner.resolveTrait(expected.alias);
      const actualTrait = this.analysis.resolveTrait(actual.alias);
      return (
        expectedTrait !== undefined &&
        actualTrait !== undefined &&
        expectedTrait.equals(actualTrait)
      );
    }
    return expected.admits(actual);
  }

  /**
   * Checks call arguments, in order, against parameter types declared in
   * `owner`
   */
  checkCallArguments(
    expected: Type[],
    args: Expression[],
    context: TypingContext,
    owner: ContractAnalysis = this.analysis,
  ): Result<void, CheckError> {
    const count = checkArgumentCount(expected.length, args);
    if (!count.success) {
      return count;
    }
    for (let i = 0; i < args.length; i++) {
      const checked = this.typeCheckExpects(
        args[i],
        context,
        expected[i],
        owner,
      );
      if (!checked.success) {
        return checked;
      }
    }
    return Result.ok(undefined);
  }

  /**
   * Fails if `name` is a language name or already defined in the contract
   */
  checkNameUnused(
    name: string,
    loc?: SourceLocation | null,
  ): Result<void, CheckError> {
    if (isReservedName(name) || this.analysis.isNameUsed(name)) {
      return Result.err(CheckErrors.nameAlreadyUsed(name).at(loc));
    }
    return Result.ok(undefined);
  }

  /**
   * Fails if `type` holds a trait reference. Trait values only pass from
   * a parameter to an argument; they are never stored, returned or
   * wrapped.
   */
  checkNoTraitReference(
    type: Type,
    loc?: SourceLocation | null,
  ): Result<void, CheckError> {
    if (Type.containsTraitReference(type)) {
      return Result.err(CheckErrors.traitReferenceNotAllowed().at(loc));
    }
    return Result.ok(undefined);
  }

  meter(fn: CostFunction, inputSize: number): Result<void, CheckError> {
    return this.costTracker.add(fn, inputSize);
  }

  private inferType(
    expr: Expression,
    context: TypingContext,
  ): Result<Type, CheckError> {
    switch (expr.kind) {
      case "value":
        return Result.ok(literalType(expr.value));
      case "atom":
        return this.lookupVariable(expr.name, context);
      case "list":
        return this.checkCall(expr, context);
      case "trait-reference":
        return Result.err(CheckErrors.traitReferenceNotAllowed());
      case "field":
        return Result.err(
          CheckErrors.badSyntax(
            "trait identifiers are only allowed in use-trait and impl-trait",
          ),
        );
    }
  }

  private lookupVariable(
    name: string,
    context: TypingContext,
  ): Result<Type, CheckError> {
    const type =
      reservedVariables.get(name) ??
      context.lookup(name) ??
      this.analysis.getVariableType(name);
    if (!type) {
      return Result.err(CheckErrors.undefinedVariable(name));
    }
    return Result.ok(type);
  }

  private checkCall(
    expr: Expression.List,
    context: TypingContext,
  ): Result<Type, CheckError> {
    if (expr.items.length === 0) {
      return Result.err(CheckErrors.badSyntax("empty expression"));
    }
    const [head, ...args] = expr.items;

    const name = Expression.matchAtom(head);
    if (name === undefined) {
      return Result.err(
        CheckErrors.badSyntax("expected a function name").at(head.loc),
      );
    }

    if (defineForms.has(name)) {
      return Result.err(
        CheckErrors.badSyntax(`'${name}' is only allowed at the top level`),
      );
    }

    const special = specialHandlers.get(name);
    if (special) {
      return special(this, args, context);
    }

    const native = nativeFunctions.get(name);
    if (native) {
      return this.checkByFunctionType(native, args, context);
    }

    const defined = this.lookupFunction(name);
    if (!defined) {
      return Result.err(CheckErrors.unknownFunction(name).at(head.loc));
    }
    if (defined.kind === "fixed") {
      const checked = this.checkCallArguments(
        defined.args.map((arg) => arg.signature),
        args,
        context,
      );
      return Result.map(checked, () => defined.returns);
    }
    return this.checkByFunctionType(defined, args, context);
  }

  private checkByFunctionType(
    type: FunctionType,
    args: Expression[],
    context: TypingContext,
  ): Result<Type, CheckError> {
    const argTypes = this.typeCheckAll(args, context);
    if (!argTypes.success) {
      return argTypes;
    }
    return checkArgumentsByFunctionType(type, argTypes.value);
  }

  private lookupFunction(name: string): FunctionType | undefined {
    return (
      this.analysis.getPrivateFunction(name) ??
      this.analysis.getReadOnlyFunctionType(name) ??
      this.analysis.getPublicFunctionType(name)
    );
  }
}

function literalType(value: Value): Type {
  switch (value.kind) {
    case "int":
      return Type.int;
    case "uint":
      return Type.uint;
    case "buffer":
      return Type.buffer(value.bytes.length);
    case "principal":
      return Type.principal;
  }
}

/**
 * Type checking pass, charging checks against `costTracker`
 */
export function createTypeCheckerPass(costTracker: CostTracker): AnalysisPass {
  return {
    run(analysis, db) {
      return new TypeChecker(analysis, db, costTracker).run();
    },
  };
}
