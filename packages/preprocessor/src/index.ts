/**
 * @strid/preprocessor - Compile-time string hashing for C-family sources
 *
 * Rewrites every `SID("text")` invocation into the hash of its literal,
 * keeping the literal as a comment:
 *
 * @example
 * ```typescript
 * import { preprocess, preprocessFile } from "@strid/preprocessor";
 *
 * const result = preprocess(`foo(SID( "hello" ));`);
 * // result.ok && result.code === `foo(0x0f923099 /* "hello" *\/);`
 *
 * const file = preprocessFile("src/game.c", "src/game.c");
 * // { ok: true, modified: true, ... }
 * ```
 *
 * @packageDocumentation
 */

// Main entry points
export {
  preprocess,
  DEFAULT_MARKER,
  type PreprocessOptions,
  type PreprocessResult,
  type PreprocessSuccess,
  type PreprocessFailure,
} from "./preprocess.js";
export { default } from "./preprocess.js";
export { preprocessFile, type PreprocessFileOptions, type FileResult } from "./preprocess-file.js";

// Scanner
export {
  Scanner,
  isSpace,
  isAlnum,
  OPEN_DELIMITER,
  CLOSE_DELIMITER,
  type ScanResult,
  type Cursor,
} from "./scanner.js";

// Rewriter
export {
  rewriteInvocation,
  formatReplacement,
  type Invocation,
  type RewriteContext,
  type RewriteOutcome,
  type RewriteState,
} from "./rewriter.js";

export { OutputBuffer } from "./output-buffer.js";

// Errors
export {
  PreprocessError,
  sourceUnreadable,
  destinationUnwritable,
  invalidInvocation,
  unterminatedLiteral,
  missingClosingDelimiter,
  hashCollision,
  type InvocationErrorContext,
  type PreprocessErrorKind,
  type PreprocessErrorDetails,
} from "./errors.js";

export type { Replacement, RawSourceMap } from "./types.js";
