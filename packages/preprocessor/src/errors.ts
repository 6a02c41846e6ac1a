/**
 * Preprocessor errors
 *
 * Every failure is scoped to one file and carries a structured diagnostic.
 * Nothing here prints; rendering is left to the caller.
 */

import {
  DiagnosticBuilder,
  STRID1001,
  STRID1002,
  STRID1003,
  STRID1004,
  STRID1005,
  STRID1006,
  decodeByteString,
  formatHash,
  type CollisionEntry,
  type RichDiagnostic,
} from "@strid/core";

export type PreprocessErrorKind =
  | "SourceUnreadable"
  | "InvalidInvocation"
  | "UnterminatedLiteral"
  | "MissingClosingDelimiter"
  | "DestinationUnwritable"
  | "HashCollision";

export interface PreprocessErrorDetails {
  /** Byte offset of the offending invocation, when known */
  offset?: number;
  /** Offending source text, decoded for display */
  snippet?: string;
  cause?: unknown;
}

/** Error raised (or returned) when a file cannot be preprocessed. */
export class PreprocessError extends Error {
  readonly offset?: number;
  readonly snippet?: string;

  constructor(
    readonly kind: PreprocessErrorKind,
    readonly path: string,
    readonly diagnostic: RichDiagnostic,
    details: PreprocessErrorDetails = {}
  ) {
    super(`${path}: ${diagnostic.message}`, { cause: details.cause });
    this.name = "PreprocessError";
    this.offset = details.offset;
    this.snippet = details.snippet;
  }

  toDiagnostic(): RichDiagnostic {
    return this.diagnostic;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? `${cause.code}: ` : "";
    return code + cause.message.replace(/^[A-Z]+: /, "");
  }
  return String(cause);
}

/** End of the line containing `offset`, excluding the newline. */
function endOfLine(text: string, offset: number): number {
  let end = offset;
  while (end < text.length && text.charCodeAt(end) !== 10 && text.charCodeAt(end) !== 13) end++;
  return end;
}

export function sourceUnreadable(path: string, cause: unknown): PreprocessError {
  const diagnostic = new DiagnosticBuilder(STRID1001)
    .inFile(path)
    .withArgs({ path })
    .note(describeCause(cause))
    .build();
  return new PreprocessError("SourceUnreadable", path, diagnostic, { cause });
}

export function destinationUnwritable(path: string, cause: unknown): PreprocessError {
  const diagnostic = new DiagnosticBuilder(STRID1005)
    .inFile(path)
    .withArgs({ path })
    .note(describeCause(cause))
    .build();
  return new PreprocessError("DestinationUnwritable", path, diagnostic, { cause });
}

export interface InvocationErrorContext {
  fileName: string;
  /** Whole input as a byte string */
  text: string;
  marker: string;
  /** Offset of the marker token */
  invocationStart: number;
}

/**
 * The marker was followed by something other than a string literal.
 * `found` is the offset of the unexpected byte (or the end of input).
 */
export function invalidInvocation(ctx: InvocationErrorContext, found: number): PreprocessError {
  const spanEnd = Math.min(found + 1, ctx.text.length);
  const snippet = decodeByteString(ctx.text.slice(ctx.invocationStart, endOfLine(ctx.text, spanEnd)));
  const diagnostic = new DiagnosticBuilder(STRID1002)
    .at({
      fileName: ctx.fileName,
      text: ctx.text,
      start: ctx.invocationStart,
      length: spanEnd - ctx.invocationStart,
    })
    .withArgs({ marker: ctx.marker })
    .label("expected a string literal")
    .help(`Wrap the argument in double quotes: ${ctx.marker}("...")`)
    .build();
  return new PreprocessError("InvalidInvocation", ctx.fileName, diagnostic, {
    offset: ctx.invocationStart,
    snippet,
  });
}

/**
 * A literal opened at `quote` ran into the end of input.
 */
export function unterminatedLiteral(ctx: InvocationErrorContext, quote: number): PreprocessError {
  const snippet = decodeByteString(ctx.text.slice(quote + 1, endOfLine(ctx.text, quote + 1)));
  const diagnostic = new DiagnosticBuilder(STRID1003)
    .at({
      fileName: ctx.fileName,
      text: ctx.text,
      start: quote,
      length: endOfLine(ctx.text, quote) - quote,
    })
    .withArgs({ marker: ctx.marker })
    .label("string starts here")
    .help('Close the string with an unescaped "')
    .build();
  return new PreprocessError("UnterminatedLiteral", ctx.fileName, diagnostic, {
    offset: ctx.invocationStart,
    snippet,
  });
}

/**
 * The literal was not followed by the closing delimiter. `found` is the
 * offset of the unexpected byte (or the end of input).
 */
export function missingClosingDelimiter(
  ctx: InvocationErrorContext,
  literal: string,
  found: number
): PreprocessError {
  const snippet = decodeByteString(literal);
  const spanEnd = Math.min(found + 1, ctx.text.length);
  const diagnostic = new DiagnosticBuilder(STRID1004)
    .at({
      fileName: ctx.fileName,
      text: ctx.text,
      start: ctx.invocationStart,
      length: spanEnd - ctx.invocationStart,
    })
    .withArgs({ marker: ctx.marker, literal: snippet })
    .label("expected `)`")
    .help("Close the invocation with `)`")
    .build();
  return new PreprocessError("MissingClosingDelimiter", ctx.fileName, diagnostic, {
    offset: ctx.invocationStart,
    snippet,
  });
}

export function hashCollision(
  ctx: InvocationErrorContext,
  length: number,
  literal: string,
  hash: number,
  existing: CollisionEntry
): PreprocessError {
  const diagnostic = new DiagnosticBuilder(STRID1006)
    .at({ fileName: ctx.fileName, text: ctx.text, start: ctx.invocationStart, length })
    .withArgs({ hash: formatHash(hash), literal, existing: existing.literal })
    .label("this string")
    .note(`"${existing.literal}" was seen first in ${existing.fileName} at byte ${existing.offset}`)
    .build();
  return new PreprocessError("HashCollision", ctx.fileName, diagnostic, {
    offset: ctx.invocationStart,
    snippet: literal,
  });
}
