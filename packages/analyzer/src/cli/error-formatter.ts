/**
 * Diagnostic formatting with source context
 */

import type { AnalysisError } from "#errors";

export interface SourceFile {
  path: string;
  source: string;
}

export interface Position {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

/**
 * Line and column of a character offset
 */
export function locate(source: string, offset: number): Position {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, source.length);
  for (let i = 0; i < end; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: end - lineStart + 1 };
}

/**
 * `file:line:column: severity[CODE]: message`, followed by the offending
 * source line and a caret under the start of the failing expression
 */
export function formatError(error: AnalysisError, file: SourceFile): string {
  const label = `${error.severity}[${error.code}]: ${error.message}`;
  if (!error.location) {
    return `${file.path}: ${label}`;
  }

  const { line, column } = locate(file.source, error.location.offset);
  const text = file.source.split("\n")[line - 1] ?? "";
  return [
    `${file.path}:${line}:${column}: ${label}`,
    `  ${text}`,
    `  ${" ".repeat(column - 1)}^`,
  ].join("\n");
}
