/* eslint-disable no-console */

/**
 * Analysis of contract files, in deployment order
 */

import { readFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";

import { MemoryAnalysisDatabase, analyze } from "#analysis";
import { CostTracker } from "#costs";
import type { AnalysisError } from "#errors";
import { Result } from "#result";
import { QualifiedContractIdentifier, isContractName, isIssuer } from "#types";

import type { SourceFile } from "./error-formatter.js";
import {
  formatJson,
  formatSummary,
  summarize,
  type ContractSummary,
} from "./formatters.js";
import { commonOptions, formatUsage, parseCostLimit } from "./options.js";
import { displayErrors, exitWithError, writeOutput } from "./output.js";

export interface CheckContractsOptions {
  issuer: string;
  costLimit: number;
}

export type ContractReport =
  | { file: string; success: true; cost: number; summary: ContractSummary }
  | { file: string; success: false; cost: number; errors: AnalysisError[] };

/**
 * Contract name a file is deployed under: its base name without extension
 */
export function contractNameOf(file: string): string {
  return path.basename(file, path.extname(file));
}

/**
 * Analyzes `files` in order against one database, so that each contract
 * can refer to those before it. Stops at the first contract that fails.
 */
export function checkContracts(
  files: SourceFile[],
  options: CheckContractsOptions,
): ContractReport[] {
  const db = new MemoryAnalysisDatabase();
  const reports: ContractReport[] = [];

  for (const file of files) {
    const costTracker = CostTracker.limited(options.costLimit);
    const result = analyze(
      new QualifiedContractIdentifier(
        options.issuer,
        contractNameOf(file.path),
      ),
      file.source,
      db,
      { costTracker, save: true },
    );

    if (!result.success) {
      reports.push({
        file: file.path,
        success: false,
        cost: costTracker.total,
        errors: Result.errors(result),
      });
      break;
    }
    reports.push({
      file: file.path,
      success: true,
      cost: costTracker.total,
      summary: summarize(result.value),
    });
  }
  return reports;
}

const jsonReport = (report: ContractReport) =>
  report.success
    ? report
    : {
        ...report,
        errors: report.errors.map((error) => ({
          code: error.code,
          message: error.message,
          location: error.location,
        })),
      };

/**
 * Entry point of the `check` binary
 */
export async function handleCheckCommand(
  args: string[] = process.argv.slice(2),
): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: commonOptions,
    allowPositionals: true,
  });

  if (values.help || positionals.length === 0) {
    console.log(
      formatUsage("check", "Statically analyze contracts in deployment order"),
    );
    return;
  }

  const costLimit = parseCostLimit(values["cost-limit"] ?? "");
  if (costLimit === undefined) {
    exitWithError(`invalid cost limit '${values["cost-limit"]}'`);
  }
  const issuer = values.issuer ?? "";
  if (!isIssuer(issuer)) {
    exitWithError(`invalid issuer '${issuer}'`);
  }
  for (const file of positionals) {
    if (!isContractName(contractNameOf(file))) {
      exitWithError(`'${file}' does not name a valid contract`);
    }
  }

  const files: SourceFile[] = [];
  for (const file of positionals) {
    files.push({ path: file, source: await readFile(file, "utf-8") });
  }

  const reports = checkContracts(files, { issuer, costLimit });

  if (values.json) {
    await writeOutput(formatJson(reports.map(jsonReport)), values.output);
  } else {
    const summaries = reports.flatMap((report) =>
      report.success ? [formatSummary(report.summary, report.cost)] : [],
    );
    await writeOutput(summaries.join("\n"), values.output);
  }

  const failed = reports.find((report) => !report.success);
  if (failed && !failed.success) {
    const file = files.find((f) => f.path === failed.file);
    if (file) {
      displayErrors(failed.errors, file);
    }
    process.exit(1);
  }
}
