/**
 * Core module exports for @strid/core
 *
 * This package provides:
 * - Hash primitives shared by the preprocessor and run-time code
 * - The diagnostics catalog and CLI renderer
 * - Configuration loading
 * - The opt-in collision registry
 */

// Hash primitives
export {
  djb2,
  fnv1a,
  HASH_ALGORITHMS,
  isHashAlgorithm,
  getHashFunction,
  hashString,
  sid,
  formatHash,
  type HashFunction,
  type HashAlgorithm,
} from "./hash.js";

// Configuration System
export {
  loadConfig,
  loadConfigFromEnv,
  loadConfigFromFiles,
  validateConfig,
  defineConfig,
  isValidMarker,
  ConfigError,
  DEFAULT_CONFIG,
  type StridConfig,
  type ResolvedStridConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config.js";

// Collision registry
export {
  createCollisionRegistry,
  stageCollisionRegistry,
  type CollisionRegistry,
  type StagedCollisionRegistry,
  type CollisionEntry,
} from "./collisions.js";

// Diagnostics System
export * from "./diagnostics.js";

// Byte strings
export { toByteString, fromByteString, decodeByteString } from "./bytes.js";
