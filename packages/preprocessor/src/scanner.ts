/**
 * Scanner/Copier for the strid preprocessor
 *
 * Walks a byte string and copies everything verbatim to the output buffer
 * until it reaches a marker invocation (`SID(` by default) at a word
 * boundary. Only ASCII letters and digits form words, mirroring C's
 * `isalnum` in the "C" locale: `MY_SID(` contains an invocation, while
 * `MYSID(` and `SIDX(` do not.
 */

import { isValidMarker } from "@strid/core";
import type { OutputBuffer } from "./output-buffer.js";

/**
 * Outcome of one scan step.
 *
 * - `copied`: some bytes were copied, keep going
 * - `invocation`: positioned right after a marker token
 * - `end`: input exhausted
 */
export type ScanResult = "copied" | "invocation" | "end";

/** Read position in the input and write position in the output. */
export interface Cursor {
  read: number;
  write: number;
}

/** The delimiter that must immediately follow the marker name. */
export const OPEN_DELIMITER = "(";
export const CLOSE_DELIMITER = ")";

/** C-locale isspace: space, \t, \n, \v, \f, \r */
export function isSpace(code: number): boolean {
  return code === 0x20 || (code >= 0x09 && code <= 0x0d);
}

/** C-locale isalnum: ASCII letters and digits */
export function isAlnum(code: number): boolean {
  return (
    (code >= 0x30 && code <= 0x39) ||
    (code >= 0x41 && code <= 0x5a) ||
    (code >= 0x61 && code <= 0x7a)
  );
}

export class Scanner {
  private pos: number = 0;
  private tokenStart: number = -1;

  /** Marker name followed by the opening delimiter */
  readonly token: string;

  constructor(
    readonly text: string,
    readonly out: OutputBuffer,
    readonly marker: string
  ) {
    if (!isValidMarker(marker)) {
      throw new Error(`Invalid marker "${marker}": only ASCII letters and digits are allowed`);
    }
    this.token = marker + OPEN_DELIMITER;
  }

  get position(): number {
    return this.pos;
  }

  get cursor(): Cursor {
    return { read: this.pos, write: this.out.length };
  }

  /** Input offset of the marker token most recently matched, or -1 */
  get invocationStart(): number {
    return this.tokenStart;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  /**
   * Byte at the read position plus `offset`, or -1 past the end.
   */
  peek(offset: number = 0): number {
    const index = this.pos + offset;
    return index < this.text.length ? this.text.charCodeAt(index) : -1;
  }

  /**
   * Move the read position forward without copying.
   */
  advance(count: number = 1): void {
    this.pos = Math.min(this.text.length, this.pos + count);
  }

  /**
   * Skip whitespace without copying it.
   */
  skipWhitespace(): void {
    while (!this.atEnd() && isSpace(this.text.charCodeAt(this.pos))) {
      this.pos++;
    }
  }

  /**
   * Perform one unit of work: copy a whitespace run, a single non-word
   * byte, or a whole word; or stop at a marker token.
   */
  step(): ScanResult {
    if (this.atEnd()) {
      return "end";
    }

    const code = this.text.charCodeAt(this.pos);

    if (isSpace(code)) {
      const start = this.pos;
      while (!this.atEnd() && isSpace(this.text.charCodeAt(this.pos))) {
        this.pos++;
      }
      this.out.appendByteString(this.text, start, this.pos);
      return "copied";
    }

    if (!isAlnum(code)) {
      this.out.appendByte(code);
      this.pos++;
      return "copied";
    }

    // Start of a word: only here can a marker token begin
    if (this.text.startsWith(this.token, this.pos)) {
      this.tokenStart = this.pos;
      this.pos += this.token.length;
      return "invocation";
    }

    // Copy the whole word so a marker inside it can't re-trigger
    const start = this.pos;
    while (!this.atEnd() && isAlnum(this.text.charCodeAt(this.pos))) {
      this.pos++;
    }
    this.out.appendByteString(this.text, start, this.pos);
    return "copied";
  }

  /**
   * Copy until the next marker invocation or the end of input.
   */
  next(): Exclude<ScanResult, "copied"> {
    for (;;) {
      const result = this.step();
      if (result !== "copied") {
        return result;
      }
    }
  }
}
