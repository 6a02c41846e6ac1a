/**
 * Hash primitives
 *
 * A hash function maps a sequence of bytes to an unsigned 32-bit integer.
 * The preprocessor never calls a hash directly; it receives one as an
 * option, so any function with this signature can be swapped in.
 *
 * @example
 * ```typescript
 * import { sid, formatHash } from "@strid/core";
 *
 * formatHash(sid("hello")); // "0x0f923099"
 * ```
 */

/**
 * Deterministic, total hash over raw bytes. Must return a value in
 * `[0, 2^32)`. Collisions are possible and not checked here.
 */
export type HashFunction = (bytes: Uint8Array) => number;

/** Names of the built-in algorithms, as accepted by config and the CLI. */
export type HashAlgorithm = "djb2" | "fnv1a";

/**
 * Bernstein's djb2: `h = h * 33 + byte`, seeded with 5381.
 */
export const djb2: HashFunction = (bytes) => {
  let h = 5381;
  for (let i = 0; i < bytes.length; i++) {
    h = (Math.imul(h, 33) + bytes[i]) >>> 0;
  }
  return h;
};

/**
 * FNV-1a 32-bit.
 */
export const fnv1a: HashFunction = (bytes) => {
  let h = 0x811c9dc5;
  for (let i = 0; i < bytes.length; i++) {
    h ^= bytes[i];
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
};

export const HASH_ALGORITHMS: Readonly<Record<HashAlgorithm, HashFunction>> = {
  djb2,
  fnv1a,
};

export function isHashAlgorithm(name: string): name is HashAlgorithm {
  return Object.prototype.hasOwnProperty.call(HASH_ALGORITHMS, name);
}

/**
 * Look up a built-in hash function by name.
 *
 * @returns undefined for unknown names
 */
export function getHashFunction(name: string): HashFunction | undefined {
  return isHashAlgorithm(name) ? HASH_ALGORITHMS[name] : undefined;
}

const encoder = new TextEncoder();

/**
 * Hash the UTF-8 encoding of a string. This is the run-time counterpart of
 * a preprocessed constant: a UTF-8 source file containing `SID("text")`
 * is rewritten to `formatHash(hashString("text"))`.
 */
export function hashString(text: string, hash: HashFunction = djb2): number {
  return hash(encoder.encode(text));
}

/**
 * Hash a string at run time with the default algorithm.
 */
export function sid(text: string): number {
  return hashString(text, djb2);
}

/**
 * Render a hash as a C-style hex literal: `0x` and 8 lowercase digits.
 */
export function formatHash(hash: number): string {
  return "0x" + (hash >>> 0).toString(16).padStart(8, "0");
}
