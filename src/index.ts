/**
 * strid - Compile-time string hashing for C-family sources
 *
 * Rewrites `SID("text")` invocations in C and C++ sources into the hash of
 * the literal, keeping the literal as a comment. The same hash is
 * available at run time through `sid()`.
 *
 * @example
 * ```typescript
 * import { preprocess, sid, formatHash } from "strid";
 *
 * const result = preprocess(`play(SID("player.jump"));`);
 * // result.ok && result.code === `play(0x32d5555c /* "player.jump" *\/);`
 *
 * formatHash(sid("player.jump")); // "0x32d5555c"
 * ```
 *
 * @packageDocumentation
 */

export * from "@strid/core";
export * from "@strid/preprocessor";

export { runCli, parseArgs, UsageError, type CliOptions, type Command } from "./cli/run.js";
export type { CliIO } from "./cli/io.js";
