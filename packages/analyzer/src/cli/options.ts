/**
 * Command-line options
 */

import { DEFAULT_COST_LIMIT } from "#costs";
import { TRANSIENT_ISSUER } from "#types";

export interface OptionConfig {
  type: "string" | "boolean";
  short?: string;
  default?: string | boolean;
  description: string;
}

export const commonOptions = {
  "cost-limit": {
    type: "string",
    default: String(DEFAULT_COST_LIMIT),
    description: "Analysis cost budget for each contract",
  },
  issuer: {
    type: "string",
    default: TRANSIENT_ISSUER,
    description: "Issuer the contracts are deployed under",
  },
  json: {
    type: "boolean",
    default: false,
    description: "Print the analysis report as JSON",
  },
  output: {
    type: "string",
    short: "o",
    description: "Write the report to a file instead of stdout",
  },
  help: {
    type: "boolean",
    short: "h",
    description: "Show this help message",
  },
} as const satisfies Record<string, OptionConfig>;

/**
 * Parses a cost budget given on the command line
 */
export function parseCostLimit(text: string): number | undefined {
  if (!/^[0-9]+$/.test(text)) {
    return undefined;
  }
  const limit = Number(text);
  return Number.isSafeInteger(limit) ? limit : undefined;
}

export function formatUsage(name: string, description: string): string {
  const lines = [
    description,
    "",
    `Usage: ${name} [options] <contract-file> ...`,
    "",
    "Options:",
  ];
  for (const [option, config] of Object.entries(commonOptions)) {
    const flag: OptionConfig = config;
    const short = flag.short ? `-${flag.short}, ` : "    ";
    const fallback =
      flag.default !== undefined && flag.type === "string"
        ? ` (default: ${flag.default})`
        : "";
    lines.push(
      `  ${short}--${option.padEnd(12)} ${flag.description}${fallback}`,
    );
  }
  return lines.join("\n");
}
