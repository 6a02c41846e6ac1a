/**
 * strid expand: show preprocessed output
 *
 * Preprocesses a single file in memory and prints the result without
 * touching the file, similar to Rust's `cargo expand`.
 *
 * Usage:
 *   strid expand src/game.c
 *   strid expand --diff src/game.c
 */

import * as fs from "fs";
import { preprocess, sourceUnreadable, type PreprocessOptions } from "@strid/preprocessor";
import type { RichDiagnostic } from "@strid/core";
import type { CliIO } from "./io.js";

export interface ExpandOptions extends Omit<PreprocessOptions, "fileName" | "sourceMap"> {
  /** File to expand */
  file: string;

  /** Show a line diff between original and expanded */
  diff: boolean;
}

/**
 * Run the expand command.
 *
 * @returns the diagnostic of a failed file, or undefined on success
 */
export function runExpand(options: ExpandOptions, io: CliIO): RichDiagnostic | undefined {
  const { file, diff, ...preprocessOptions } = options;

  let input: Buffer;
  try {
    input = fs.readFileSync(file);
  } catch (error) {
    return sourceUnreadable(file, error).toDiagnostic();
  }

  const result = preprocess(input, { ...preprocessOptions, fileName: file });
  if (!result.ok) {
    return result.error.toDiagnostic();
  }

  if (diff) {
    printDiff(input.toString("utf8"), result.code, file, io);
  } else {
    io.out(result.code);
  }
  return undefined;
}

/**
 * Print a simple line diff between original and expanded source.
 * Rewriting never adds or removes lines, so lines are compared by index.
 */
export function printDiff(original: string, expanded: string, filePath: string, io: CliIO): void {
  const origLines = original.split("\n");
  const expLines = expanded.split("\n");

  const hunks: Array<{
    origStart: number;
    origLines: string[];
    expLines: string[];
  }> = [];

  const maxLen = Math.max(origLines.length, expLines.length);
  let inHunk = false;

  for (let i = 0; i < maxLen; i++) {
    const origLine = origLines[i] ?? "";
    const expLine = expLines[i] ?? "";

    if (origLine === expLine) {
      inHunk = false;
      continue;
    }

    if (!inHunk) {
      inHunk = true;
      hunks.push({ origStart: i, origLines: [], expLines: [] });
    }
    const hunk = hunks[hunks.length - 1];
    if (i < origLines.length) hunk.origLines.push(origLine);
    if (i < expLines.length) hunk.expLines.push(expLine);
  }

  if (hunks.length === 0) {
    io.out("(no changes, no strings hashed)");
    return;
  }

  const paint = (code: string, text: string): string =>
    io.colors ? `\x1b[${code}m${text}\x1b[0m` : text;

  io.out(`--- ${filePath} (original)`);
  io.out(`+++ ${filePath} (expanded)`);
  io.out("");

  for (const hunk of hunks) {
    io.out(
      `@@ -${hunk.origStart + 1},${hunk.origLines.length} +${hunk.origStart + 1},${hunk.expLines.length} @@`
    );
    for (const line of hunk.origLines) {
      io.out(paint("31", `- ${line}`));
    }
    for (const line of hunk.expLines) {
      io.out(paint("32", `+ ${line}`));
    }
    io.out("");
  }
}
