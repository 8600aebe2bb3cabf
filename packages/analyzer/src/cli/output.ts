/* eslint-disable no-console */

/**
 * Output handling for the command line
 */

import { writeFile } from "fs/promises";

import type { AnalysisError } from "#errors";

import { formatError, type SourceFile } from "./error-formatter.js";

export function displayErrors(errors: AnalysisError[], file: SourceFile): void {
  for (const error of errors) {
    console.error(formatError(error, file));
  }
}

/**
 * Writes `content` to `outputPath`, or to stdout when none is given
 */
export async function writeOutput(
  content: string,
  outputPath?: string,
): Promise<void> {
  if (outputPath) {
    const text = content.endsWith("\n") ? content : `${content}\n`;
    await writeFile(outputPath, text);
    return;
  }
  if (content) {
    console.log(content);
  }
}

export function exitWithError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}
