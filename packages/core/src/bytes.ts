/**
 * Byte strings
 *
 * The preprocessor scans raw bytes but leans on string APIs (slicing,
 * `startsWith`, MagicString). A byte string holds one UTF-16 code unit per
 * byte (a latin1 decode), so the round trip bytes → string → bytes is exact
 * for any input, valid UTF-8 or not.
 */

export function toByteString(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("latin1");
}

export function fromByteString(text: string): Uint8Array {
  return Buffer.from(text, "latin1");
}

/**
 * Decode a byte string as UTF-8 for display. Invalid sequences become U+FFFD.
 */
export function decodeByteString(text: string): string {
  return Buffer.from(text, "latin1").toString("utf8");
}
