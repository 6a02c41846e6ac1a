/**
 * Rewriter for the strid preprocessor
 *
 * Consumes one marker invocation, starting right after the marker token:
 *
 *   SID( "player.jump" )  →  0x32d5555c /* "player.jump" *\/
 *
 * The literal is hashed exactly as it appears between the quotes; escape
 * sequences are neither validated nor unescaped.
 */

import { decodeByteString, formatHash, fromByteString, type HashFunction } from "@strid/core";
import { CLOSE_DELIMITER, type Scanner } from "./scanner.js";
import {
  invalidInvocation,
  missingClosingDelimiter,
  unterminatedLiteral,
  type InvocationErrorContext,
  type PreprocessError,
} from "./errors.js";
import type { Replacement } from "./types.js";

const QUOTE = 0x22; // "
const BACKSLASH = 0x5c; // \
const CLOSE = CLOSE_DELIMITER.charCodeAt(0);

/**
 * States of a single invocation rewrite. Any failure moves to `Failed`,
 * which aborts the whole file.
 */
export type RewriteState =
  | "AfterMarker"
  | "ExpectQuote"
  | "InLiteral"
  | "AfterLiteral"
  | "ExpectCloseDelim"
  | "Done"
  | "Failed";

/** A successfully rewritten invocation. */
export interface Invocation {
  /** Offset of the marker token in the input */
  start: number;
  /** Offset just past the closing delimiter */
  end: number;
  /** Literal content as written (escapes included), decoded as UTF-8 */
  literal: string;
  hash: number;
  /** Text that replaced `[start, end)` */
  replacement: string;
}

export interface RewriteContext {
  hash: HashFunction;
  marker: string;
  fileName: string;
}

export type RewriteOutcome =
  | { ok: true; state: "Done"; invocation: Invocation; edit: Replacement }
  | { ok: false; state: "Failed"; failedIn: RewriteState; error: PreprocessError };

/**
 * Format the replacement for a literal span given as a byte string.
 */
export function formatReplacement(hash: number, span: string): string {
  return `${formatHash(hash)} /* "${span}" */`;
}

/**
 * Rewrite the invocation whose marker token the scanner just matched,
 * appending the replacement to the scanner's output buffer.
 */
export function rewriteInvocation(scanner: Scanner, context: RewriteContext): RewriteOutcome {
  const text = scanner.text;
  const errorContext: InvocationErrorContext = {
    fileName: context.fileName,
    text,
    marker: context.marker,
    invocationStart: scanner.invocationStart,
  };
  const fail = (failedIn: RewriteState, error: PreprocessError): RewriteOutcome => ({
    ok: false,
    state: "Failed",
    failedIn,
    error,
  });

  let state: RewriteState = "AfterMarker";

  scanner.skipWhitespace();
  state = "ExpectQuote";
  if (scanner.peek() !== QUOTE) {
    return fail(state, invalidInvocation(errorContext, scanner.position));
  }

  const quote = scanner.position;
  scanner.advance();
  const literalStart = scanner.position;
  state = "InLiteral";

  for (;;) {
    const code = scanner.peek();
    if (code === -1) {
      return fail(state, unterminatedLiteral(errorContext, quote));
    }
    if (code === BACKSLASH) {
      // An escape always spans two bytes; a lone trailing backslash leaves
      // the literal open
      if (scanner.peek(1) === -1) {
        return fail(state, unterminatedLiteral(errorContext, quote));
      }
      scanner.advance(2);
      continue;
    }
    if (code === QUOTE) {
      break;
    }
    scanner.advance();
  }

  const span = text.slice(literalStart, scanner.position);
  const hash = context.hash(fromByteString(span)) >>> 0;
  const replacement = formatReplacement(hash, span);
  scanner.out.appendByteString(replacement);

  state = "AfterLiteral";
  scanner.advance();
  scanner.skipWhitespace();

  state = "ExpectCloseDelim";
  if (scanner.peek() !== CLOSE) {
    return fail(state, missingClosingDelimiter(errorContext, span, scanner.position));
  }
  scanner.advance();

  return {
    ok: true,
    state: "Done",
    invocation: {
      start: errorContext.invocationStart,
      end: scanner.position,
      literal: decodeByteString(span),
      hash,
      replacement: decodeByteString(replacement),
    },
    edit: { start: errorContext.invocationStart, end: scanner.position, text: replacement },
  };
}
