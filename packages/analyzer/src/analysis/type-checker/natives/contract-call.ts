/**
 * `(contract-call? target function-name args ...)`
 *
 * The target is either a literal contract principal, resolved against the
 * analysis database, or a variable of trait-reference type, in which case
 * the call is checked against the trait's method signature.
 */

import { Expression } from "#ast";
import { CostFunction } from "#costs";
import { Result } from "#result";
import {
  FunctionType,
  QualifiedContractIdentifier,
  Type,
  type FunctionSignature,
} from "#types";

import type { ContractAnalysis } from "../../contract-analysis.js";
import { CheckErrors, type CheckError } from "../../errors.js";
import type { TypeChecker } from "../checker.js";
import type { TypingContext } from "../context.js";
import { checkArgumentsAtLeast } from "../functions.js";

import type { SpecialHandler } from "./handler.js";

export const checkSpecialContractCall: SpecialHandler = (
  checker,
  args,
  context,
) => {
  const count = checkArgumentsAtLeast(2, args);
  if (!count.success) {
    return count;
  }
  const [target, functionNameExpr, ...callArgs] = args;

  const functionName = Expression.matchAtom(functionNameExpr);
  if (functionName === undefined) {
    return Result.err(
      CheckErrors.contractCallExpectName().at(functionNameExpr.loc),
    );
  }

  if (target.kind === "value" && target.value.kind === "principal") {
    const { issuer, contract } = target.value;
    if (contract === undefined) {
      return Result.err(CheckErrors.contractCallExpectName().at(target.loc));
    }
    return checkStaticCall(
      checker,
      new QualifiedContractIdentifier(issuer, contract),
      functionName,
      callArgs,
      context,
    );
  }

  if (target.kind === "atom") {
    const targetType = checker.typeCheck(target, context);
    if (!targetType.success) {
      return targetType;
    }
    if (Type.isTraitReference(targetType.value)) {
      return checkDynamicCall(
        checker,
        targetType.value,
        functionName,
        callArgs,
        context,
      );
    }
  }

  return Result.err(CheckErrors.contractCallExpectName().at(target.loc));
};

function checkStaticCall(
  checker: TypeChecker,
  contractIdentifier: QualifiedContractIdentifier,
  functionName: string,
  args: Expression[],
  context: TypingContext,
): Result<Type, CheckError> {
  const callee = checker.db.loadContract(contractIdentifier);
  if (!callee) {
    return Result.err(
      CheckErrors.noSuchContract(contractIdentifier.toString()),
    );
  }

  const functionType =
    callee.getPublicFunctionType(functionName) ??
    callee.getReadOnlyFunctionType(functionName);
  if (!functionType || functionType.kind !== "fixed") {
    return Result.err(
      CheckErrors.noSuchPublicFunction(
        contractIdentifier.toString(),
        functionName,
      ),
    );
  }

  return checkAgainstSignature(
    checker,
    FunctionType.toSignature(functionType),
    callee,
    args,
    context,
  );
}

function checkDynamicCall(
  checker: TypeChecker,
  targetType: Type.TraitReference,
  functionName: string,
  args: Expression[],
  context: TypingContext,
): Result<Type, CheckError> {
  const { analysis } = checker;

  const trait = analysis.resolveTrait(targetType.alias);
  if (!trait) {
    return Result.err(CheckErrors.traitReferenceUnknown(targetType.alias));
  }

  // traits defined earlier in this contract are not in the database yet
  const definingContract: ContractAnalysis | undefined =
    trait.contractIdentifier.equals(analysis.contractIdentifier)
      ? analysis
      : checker.db.loadContract(trait.contractIdentifier);
  const definition = definingContract?.getDefinedTrait(trait.name);
  if (!definingContract || !definition) {
    return Result.err(CheckErrors.traitReferenceUnknown(trait.name));
  }

  const charge = checker.meter(
    CostFunction.ANALYSIS_TRAIT_LOOKUP,
    definition.size,
  );
  if (!charge.success) {
    return charge;
  }

  const method = definition.get(functionName);
  if (!method) {
    return Result.err(
      CheckErrors.traitMethodUnknown(trait.name, functionName),
    );
  }

  return checkAgainstSignature(
    checker,
    method,
    definingContract,
    args,
    context,
  );
}

/**
 * Checks call arguments against a signature declared in `owner`, whose
 * trait namespace gives meaning to any trait-typed parameter
 */
function checkAgainstSignature(
  checker: TypeChecker,
  signature: FunctionSignature,
  owner: ContractAnalysis,
  args: Expression[],
  context: TypingContext,
): Result<Type, CheckError> {
  const checked = checker.checkCallArguments(
    signature.args,
    args,
    context,
    owner,
  );
  return Result.map(checked, () => signature.returns);
}

export const contractCallHandlers: Record<string, SpecialHandler> = {
  "contract-call?": checkSpecialContractCall,
};
