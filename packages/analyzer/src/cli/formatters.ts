/**
 * Report formatting
 */

import type { ContractAnalysis } from "#analysis";
import { FunctionType } from "#types";

export interface ContractSummary {
  contract: string;
  publicFunctions: Record<string, string>;
  readOnlyFunctions: Record<string, string>;
  privateFunctions: Record<string, string>;
  definedTraits: string[];
  implementedTraits: string[];
  fungibleTokens: string[];
  nonFungibleTokens: Record<string, string>;
}

const describeFunctions = (
  functions: Map<string, FunctionType>,
): Record<string, string> =>
  Object.fromEntries(
    [...functions].map(([name, type]) => [name, FunctionType.toString(type)]),
  );

/**
 * Declarations of an analyzed contract, as printable strings
 */
export function summarize(analysis: ContractAnalysis): ContractSummary {
  return {
    contract: analysis.contractIdentifier.toString(),
    publicFunctions: describeFunctions(analysis.publicFunctionTypes),
    readOnlyFunctions: describeFunctions(analysis.readOnlyFunctionTypes),
    privateFunctions: describeFunctions(analysis.privateFunctionTypes),
    definedTraits: [...analysis.definedTraits.keys()],
    implementedTraits: analysis.implementedTraits.map((trait) =>
      trait.toString(),
    ),
    fungibleTokens: [...analysis.fungibleTokens],
    nonFungibleTokens: Object.fromEntries(
      [...analysis.nonFungibleTokens].map(([name, type]) => [
        name,
        type.toString(),
      ]),
    ),
  };
}

/**
 * JSON with bigint support
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v),
    2,
  );
}

/**
 * Human-readable summary of one analyzed contract
 */
export function formatSummary(summary: ContractSummary, cost: number): string {
  const lines = [`${summary.contract}: ok (cost ${cost})`];
  const functions: [string, Record<string, string>][] = [
    ["public", summary.publicFunctions],
    ["read-only", summary.readOnlyFunctions],
    ["private", summary.privateFunctions],
  ];
  for (const [visibility, entries] of functions) {
    for (const [name, signature] of Object.entries(entries)) {
      lines.push(`  ${visibility} ${name} ${signature}`);
    }
  }
  for (const name of summary.definedTraits) {
    lines.push(`  trait ${name}`);
  }
  for (const trait of summary.implementedTraits) {
    lines.push(`  implements ${trait}`);
  }
  return lines.join("\n");
}
