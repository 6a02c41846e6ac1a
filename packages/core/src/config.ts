/**
 * Configuration System
 *
 * Configuration is resolved from (in priority order):
 *
 * 1. Overrides passed by the caller (CLI flags)
 * 2. Environment variables: STRID_* (for CI overrides)
 * 3. Config files found by cosmiconfig: package.json#strid, .stridrc, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { loadConfig } from "@strid/core";
 *
 * const { config, filePath } = loadConfig({ cwd: process.cwd() });
 * config.marker; // "SID"
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { isHashAlgorithm, type HashAlgorithm } from "./hash.js";

// ============================================================================
// Types
// ============================================================================

/**
 * User-facing configuration schema. Every field is optional.
 */
export interface StridConfig {
  /** Marker macro name, ASCII letters and digits only */
  marker?: string;
  /** Built-in hash algorithm */
  hash?: HashAlgorithm;
  /** File extensions visited when walking directories */
  extensions?: string[];
  /** Write a `.map` file beside every rewritten file */
  sourceMap?: boolean;
  /** Fail files whose literals collide with an earlier literal's hash */
  detectCollisions?: boolean;
  /** Enable verbose logging */
  verbose?: boolean;
}

export type ResolvedStridConfig = Required<StridConfig>;

export const DEFAULT_CONFIG: Readonly<ResolvedStridConfig> = {
  marker: "SID",
  hash: "djb2",
  extensions: [".c", ".cc", ".cpp", ".cxx", ".h", ".hh", ".hpp", ".hxx", ".inl"],
  sourceMap: false,
  detectCollisions: false,
  verbose: false,
};

/**
 * Raised when a configuration value is rejected.
 */
export class ConfigError extends Error {
  constructor(
    readonly detail: string,
    readonly origin: string
  ) {
    super(`${origin}: ${detail}`);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Validation
// ============================================================================

const MARKER_PATTERN = /^[A-Za-z0-9]+$/;

/** A marker is a non-empty run of ASCII letters and digits. */
export function isValidMarker(marker: string): boolean {
  return MARKER_PATTERN.test(marker);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBoolean(value: unknown, key: string, origin: string): boolean {
  if (typeof value === "boolean") return value;
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  throw new ConfigError(`\`${key}\` must be a boolean`, origin);
}

function parseExtensions(value: unknown, origin: string): string[] {
  const list =
    typeof value === "string"
      ? value.split(",")
      : Array.isArray(value)
        ? value
        : undefined;
  if (!list) {
    throw new ConfigError("`extensions` must be a list of file extensions", origin);
  }

  const extensions: string[] = [];
  for (const item of list) {
    if (typeof item !== "string") {
      throw new ConfigError("`extensions` must be a list of file extensions", origin);
    }
    const trimmed = item.trim();
    if (trimmed === "") continue;
    extensions.push(trimmed.startsWith(".") ? trimmed : `.${trimmed}`);
  }
  return extensions;
}

/**
 * Check an untrusted object (file contents, environment) against the schema.
 * Unknown keys are rejected so typos don't go unnoticed.
 */
export function validateConfig(raw: unknown, origin: string): StridConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("configuration must be an object", origin);
  }

  const result: StridConfig = {};

  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;

    switch (key) {
      case "marker":
        if (typeof value !== "string" || !isValidMarker(value)) {
          throw new ConfigError("`marker` must contain only ASCII letters and digits", origin);
        }
        result.marker = value;
        break;
      case "hash":
        if (typeof value !== "string" || !isHashAlgorithm(value)) {
          throw new ConfigError(`unknown hash algorithm \`${String(value)}\``, origin);
        }
        result.hash = value;
        break;
      case "extensions":
        result.extensions = parseExtensions(value, origin);
        break;
      case "sourceMap":
      case "detectCollisions":
      case "verbose":
        result[key] = parseBoolean(value, key, origin);
        break;
      default:
        throw new ConfigError(`unknown option \`${key}\``, origin);
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "STRID_";

/** Options that can be set from the environment; other STRID_* variables are ignored. */
const ENV_KEYS: ReadonlySet<string> = new Set<string>([
  "marker",
  "hash",
  "extensions",
  "sourceMap",
  "detectCollisions",
  "verbose",
]);

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   STRID_MARKER=HASH               → { marker: "HASH" }
 *   STRID_SOURCE_MAP=1              → { sourceMap: true }
 *   STRID_EXTENSIONS=.c,.h          → { extensions: [".c", ".h"] }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv): StridConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // STRID_DETECT_COLLISIONS → detectCollisions
    const configKey = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

    if (ENV_KEYS.has(configKey)) {
      raw[configKey] = value;
    }
  }

  return validateConfig(raw, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "strid";

const SEARCH_PLACES = [
  "package.json",
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `.${MODULE_NAME}rc.js`,
  `.${MODULE_NAME}rc.cjs`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.cjs`,
];

/**
 * Search `cwd` for a config file.
 */
export function loadConfigFromFiles(cwd: string): { config: StridConfig; filePath?: string } {
  const explorer = cosmiconfigSync(MODULE_NAME, { searchPlaces: SEARCH_PLACES });

  let found: { filepath: string; config: unknown; isEmpty?: boolean } | null;
  try {
    found = explorer.search(cwd);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(message, "config file");
  }

  if (!found || found.isEmpty) {
    return { config: {} };
  }

  return {
    config: validateConfig(found.config, found.filepath),
    filePath: found.filepath,
  };
}

// ============================================================================
// Resolution
// ============================================================================

export interface LoadConfigOptions {
  /** Directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Environment to read STRID_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-priority values, typically from CLI flags */
  overrides?: StridConfig;
  /** Skip the config file search */
  noFile?: boolean;
}

export interface LoadedConfig {
  config: ResolvedStridConfig;
  /** Path of the config file that contributed, if any */
  filePath?: string;
}

function merge(base: ResolvedStridConfig, layer: StridConfig): ResolvedStridConfig {
  return {
    marker: layer.marker ?? base.marker,
    hash: layer.hash ?? base.hash,
    extensions: layer.extensions ?? base.extensions,
    sourceMap: layer.sourceMap ?? base.sourceMap,
    detectCollisions: layer.detectCollisions ?? base.detectCollisions,
    verbose: layer.verbose ?? base.verbose,
  };
}

/**
 * Resolve configuration from all sources.
 *
 * @throws ConfigError when any source holds an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const fileLayer = options.noFile
    ? { config: {} }
    : loadConfigFromFiles(options.cwd ?? process.cwd());
  const envLayer = loadConfigFromEnv(options.env ?? process.env);
  const overrides = options.overrides ? validateConfig(options.overrides, "options") : {};

  // Merge: defaults < file < env < overrides
  let config = merge({ ...DEFAULT_CONFIG }, fileLayer.config);
  config = merge(config, envLayer);
  config = merge(config, overrides);

  return { config, filePath: fileLayer.filePath };
}

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: StridConfig): StridConfig {
  return cfg;
}
