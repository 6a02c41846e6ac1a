/**
 * Main preprocessor entry point
 *
 * Alternates the Scanner and the Rewriter over an in-memory buffer until
 * the input is exhausted or an invocation turns out to be malformed. A
 * failure discards everything produced so far.
 */

import MagicString from "magic-string";
import {
  ConfigError,
  decodeByteString,
  djb2,
  isValidMarker,
  toByteString,
  type CollisionEntry,
  type CollisionRegistry,
  type HashFunction,
} from "@strid/core";
import { OutputBuffer } from "./output-buffer.js";
import { Scanner } from "./scanner.js";
import { rewriteInvocation, type Invocation } from "./rewriter.js";
import { hashCollision, type PreprocessError } from "./errors.js";
import type { RawSourceMap, Replacement } from "./types.js";

export const DEFAULT_MARKER = "SID";

/** Name used in diagnostics when no file name is given */
const ANONYMOUS_FILE = "<input>";

export interface PreprocessOptions {
  /** Marker macro name (default: "SID") */
  marker?: string;
  /** Hash applied to every literal span (default: djb2) */
  hash?: HashFunction;
  /** File name for diagnostics and the source map */
  fileName?: string;
  /** Generate a source map for rewritten output */
  sourceMap?: boolean;
  /**
   * Registry checked for hash collisions. Entries from this input are only
   * recorded when the whole input preprocesses successfully.
   */
  collisions?: CollisionRegistry;
}

export interface PreprocessSuccess {
  ok: true;
  changed: boolean;
  /** Output bytes; the input bytes themselves when nothing changed */
  output: Uint8Array;
  /** Output decoded as UTF-8 (the original string when given one and unchanged) */
  code: string;
  /** Standard VLQ-encoded source map (v3 format), or null if disabled or no changes */
  map: RawSourceMap | null;
  invocations: Invocation[];
}

export interface PreprocessFailure {
  ok: false;
  error: PreprocessError;
}

export type PreprocessResult = PreprocessSuccess | PreprocessFailure;

const encoder = new TextEncoder();

/**
 * Preprocess source text, replacing every marker invocation with the hash
 * of its string literal.
 *
 * A `Uint8Array` is scanned byte for byte. A string is UTF-8 encoded first,
 * so literals hash the same way they would when read from a UTF-8 file.
 *
 * @throws ConfigError when `marker` is not a non-empty run of ASCII letters and digits
 */
export function preprocess(
  source: string | Uint8Array,
  options: PreprocessOptions = {}
): PreprocessResult {
  const marker = options.marker ?? DEFAULT_MARKER;
  if (!isValidMarker(marker)) {
    throw new ConfigError("`marker` must contain only ASCII letters and digits", "options");
  }

  const input = typeof source === "string" ? encoder.encode(source) : source;
  const text = toByteString(input);
  const fileName = options.fileName ?? ANONYMOUS_FILE;
  const hash = options.hash ?? djb2;

  const out = new OutputBuffer(text.length * 2);
  const scanner = new Scanner(text, out, marker);
  const invocations: Invocation[] = [];
  const edits: Replacement[] = [];
  const seen: CollisionEntry[] = [];

  while (scanner.next() === "invocation") {
    const outcome = rewriteInvocation(scanner, { hash, marker, fileName });
    if (!outcome.ok) {
      return { ok: false, error: outcome.error };
    }

    const { invocation, edit } = outcome;

    if (options.collisions) {
      const existing =
        seen.find((e) => e.hash === invocation.hash && e.literal !== invocation.literal) ??
        options.collisions.check(invocation.hash, invocation.literal);
      if (existing) {
        const error = hashCollision(
          { fileName, text, marker, invocationStart: invocation.start },
          invocation.end - invocation.start,
          invocation.literal,
          invocation.hash,
          existing
        );
        return { ok: false, error };
      }
      seen.push({
        hash: invocation.hash,
        literal: invocation.literal,
        fileName,
        offset: invocation.start,
      });
    }

    invocations.push(invocation);
    edits.push(edit);
  }

  if (invocations.length === 0) {
    return {
      ok: true,
      changed: false,
      output: input,
      code: typeof source === "string" ? source : decodeByteString(text),
      map: null,
      invocations,
    };
  }

  for (const entry of seen) {
    options.collisions?.record(entry);
  }

  const output = out.toBytes();
  return {
    ok: true,
    changed: true,
    output,
    code: decodeByteString(toByteString(output)),
    map: options.sourceMap ? generateSourceMap(text, edits, fileName) : null,
    invocations,
  };
}

/**
 * Replay the edits on a MagicString to derive a source map.
 */
function generateSourceMap(text: string, edits: Replacement[], fileName: string): RawSourceMap {
  const s = new MagicString(text);

  // Edits never overlap and arrive in source order
  for (const edit of edits) {
    s.overwrite(edit.start, edit.end, edit.text);
  }

  const map = s.generateMap({
    source: fileName,
    file: fileName,
    hires: true,
  });

  return {
    version: 3,
    file: map.file,
    sources: map.sources,
    sourcesContent: [decodeByteString(text)],
    names: map.names,
    mappings: map.mappings,
  };
}

export default preprocess;
