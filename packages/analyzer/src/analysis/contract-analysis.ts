import type { Expression } from "#ast";
import { Result } from "#result";
import {
  TraitIdentifier,
  type FunctionType,
  type FunctionSignature,
  type QualifiedContractIdentifier,
  type Type,
  type TypeMap,
} from "#types";

import { CheckErrors, type CheckError } from "./errors.js";

/** Required methods of a trait, in declaration order */
export type TraitDefinition = Map<string, FunctionSignature>;

/**
 * Everything one contract declares.
 *
 * Created empty when analysis of a contract starts, filled in by the type
 * checker, then only read by the trait passes. A record that passes every
 * check may be saved to the analysis database for later cross-contract
 * lookups.
 */
export class ContractAnalysis {
  readonly privateFunctionTypes = new Map<string, FunctionType>();
  readonly publicFunctionTypes = new Map<string, FunctionType>();
  readonly readOnlyFunctionTypes = new Map<string, FunctionType>();

  /** constants */
  readonly variableTypes = new Map<string, Type>();
  readonly persistedVariableTypes = new Map<string, Type>();
  readonly mapTypes = new Map<string, [key: Type, value: Type]>();
  readonly fungibleTokens = new Set<string>();
  readonly nonFungibleTokens = new Map<string, Type>();

  readonly definedTraits = new Map<string, TraitDefinition>();
  readonly referencedTraits = new Map<string, TraitIdentifier>();
  private readonly implemented = new Map<string, TraitIdentifier>();

  /**
   * Indexes into `expressions` giving the order in which top-level forms
   * are analyzed; source order when undefined
   */
  topLevelExpressionSorting?: number[];

  typeMap?: TypeMap;

  constructor(
    readonly contractIdentifier: QualifiedContractIdentifier,
    readonly expressions: Expression[],
  ) {}

  addMapType(name: string, keyType: Type, valueType: Type): void {
    this.mapTypes.set(name, [keyType, valueType]);
  }

  addVariableType(name: string, type: Type): void {
    this.variableTypes.set(name, type);
  }

  addPersistedVariableType(name: string, type: Type): void {
    this.persistedVariableTypes.set(name, type);
  }

  addReadOnlyFunction(name: string, type: FunctionType): void {
    this.readOnlyFunctionTypes.set(name, type);
  }

  addPublicFunction(name: string, type: FunctionType): void {
    this.publicFunctionTypes.set(name, type);
  }

  addPrivateFunction(name: string, type: FunctionType): void {
    this.privateFunctionTypes.set(name, type);
  }

  addNonFungibleToken(name: string, type: Type): void {
    this.nonFungibleTokens.set(name, type);
  }

  addFungibleToken(name: string): void {
    this.fungibleTokens.add(name);
  }

  addDefinedTrait(name: string, methods: TraitDefinition): void {
    this.definedTraits.set(name, methods);
  }

  addReferencedTrait(alias: string, trait: TraitIdentifier): void {
    this.referencedTraits.set(alias, trait);
  }

  addImplementedTrait(trait: TraitIdentifier): void {
    this.implemented.set(trait.toString(), trait);
  }

  /**
   * Implemented traits in canonical (sorted) order
   */
  get implementedTraits(): TraitIdentifier[] {
    return [...this.implemented.values()].sort(TraitIdentifier.compare);
  }

  getPublicFunctionType(name: string): FunctionType | undefined {
    return this.publicFunctionTypes.get(name);
  }

  getReadOnlyFunctionType(name: string): FunctionType | undefined {
    return this.readOnlyFunctionTypes.get(name);
  }

  getPrivateFunction(name: string): FunctionType | undefined {
    return this.privateFunctionTypes.get(name);
  }

  getMapType(name: string): [key: Type, value: Type] | undefined {
    return this.mapTypes.get(name);
  }

  getVariableType(name: string): Type | undefined {
    return this.variableTypes.get(name);
  }

  getPersistedVariableType(name: string): Type | undefined {
    return this.persistedVariableTypes.get(name);
  }

  getNftType(name: string): Type | undefined {
    return this.nonFungibleTokens.get(name);
  }

  ftExists(name: string): boolean {
    return this.fungibleTokens.has(name);
  }

  getDefinedTrait(name: string): TraitDefinition | undefined {
    return this.definedTraits.get(name);
  }

  getReferencedTrait(alias: string): TraitIdentifier | undefined {
    return this.referencedTraits.get(alias);
  }

  /**
   * Fully qualified identity of the trait that `alias` names in this
   * contract's namespace, whether defined here or imported
   */
  resolveTrait(alias: string): TraitIdentifier | undefined {
    const referenced = this.referencedTraits.get(alias);
    if (referenced) {
      return referenced;
    }
    if (this.definedTraits.has(alias)) {
      return new TraitIdentifier(this.contractIdentifier, alias);
    }
    return undefined;
  }

  /**
   * Whether `name` is already taken by a function, constant, persisted
   * variable, map or asset
   */
  isNameUsed(name: string): boolean {
    return (
      this.privateFunctionTypes.has(name) ||
      this.publicFunctionTypes.has(name) ||
      this.readOnlyFunctionTypes.has(name) ||
      this.variableTypes.has(name) ||
      this.persistedVariableTypes.has(name) ||
      this.mapTypes.has(name) ||
      this.fungibleTokens.has(name) ||
      this.nonFungibleTokens.has(name)
    );
  }

  /**
   * Whether `name` is already taken in the trait namespace
   */
  isTraitNameUsed(name: string): boolean {
    return this.definedTraits.has(name) || this.referencedTraits.has(name);
  }

  /**
   * Structural first pass over a claimed trait: every required method must
   * at least exist as a public function. Signatures are compared once all
   * functions are fully typed.
   */
  checkTraitCompliance(
    trait: TraitIdentifier,
    definition: TraitDefinition,
  ): Result<void, CheckError> {
    for (const method of definition.keys()) {
      if (!this.publicFunctionTypes.has(method)) {
        return Result.err(
          CheckErrors.badTraitImplementation(trait.name, method),
        );
      }
    }
    return Result.ok(undefined);
  }

  /**
   * Top-level expressions in analysis order
   */
  *expressionsInOrder(): IterableIterator<Expression> {
    const sorting = this.topLevelExpressionSorting;
    for (let i = 0; i < this.expressions.length; i++) {
      yield this.expressions[sorting ? sorting[i] : i];
    }
  }
}
