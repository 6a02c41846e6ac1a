/**
 * strid CLI: rewrite SID("...") invocations into string hashes
 *
 * Usage:
 *   strid run [options] <paths...>
 *   strid check [options] <paths...>
 *   strid expand [--diff] <file>
 *   strid hash <text...>
 */

import * as fs from "fs";
import * as path from "path";
import {
  ConfigError,
  DiagnosticBuilder,
  HASH_ALGORITHMS,
  STRID1101,
  createCollisionRegistry,
  formatHash,
  hashString,
  loadConfig,
  renderDiagnosticCLI,
  validateConfig,
  type LoadedConfig,
  type ResolvedStridConfig,
  type RichDiagnostic,
  type StridConfig,
} from "@strid/core";
import { destinationUnwritable, preprocessFile } from "@strid/preprocessor";
import { collectFiles } from "./files.js";
import { runExpand } from "./expand.js";
import type { CliIO } from "./io.js";

export type Command = "run" | "check" | "expand" | "hash";

const COMMANDS: readonly string[] = ["run", "check", "expand", "hash"];

function isCommand(value: string): value is Command {
  return COMMANDS.includes(value);
}

export interface CliOptions {
  command: Command;
  /** Files and directories, or the texts to hash */
  paths: string[];
  /** Configuration taken from flags */
  overrides: StridConfig;
  outDir?: string;
  diff: boolean;
  help: boolean;
}

/** Bad command line; reported with the usage line. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const USAGE = "Usage: strid <run|check|expand|hash> [options] <paths...>";

export function parseArgs(args: readonly string[]): CliOptions {
  let command: Command = "run";
  let i = 0;
  const first = args[0];
  if (first !== undefined && isCommand(first)) {
    command = first;
    i = 1;
  }

  const raw: Record<string, unknown> = {};
  const paths: string[] = [];
  const extensions: string[] = [];
  let outDir: string | undefined;
  let diff = false;
  let help = false;
  let onlyPaths = false;

  while (i < args.length) {
    const arg = args[i++];
    const takeValue = (): string => {
      if (i >= args.length) {
        throw new UsageError(`Option ${arg} requires a value`);
      }
      return args[i++];
    };

    if (onlyPaths || !arg.startsWith("-") || arg === "-") {
      paths.push(arg);
      continue;
    }

    switch (arg) {
      case "--":
        onlyPaths = true;
        break;
      case "-m":
      case "--marker":
        raw.marker = takeValue();
        break;
      case "-a":
      case "--hash":
        raw.hash = takeValue();
        break;
      case "-o":
      case "--out-dir":
        outDir = takeValue();
        break;
      case "-e":
      case "--ext":
        extensions.push(...takeValue().split(","));
        break;
      case "--source-map":
        raw.sourceMap = true;
        break;
      case "--detect-collisions":
        raw.detectCollisions = true;
        break;
      case "-v":
      case "--verbose":
        raw.verbose = true;
        break;
      case "--diff":
        diff = true;
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (extensions.length > 0) {
    raw.extensions = extensions;
  }

  return {
    command,
    paths,
    overrides: validateConfig(raw, "command line"),
    outDir,
    diff,
    help,
  };
}

function printHelp(io: CliIO): void {
  io.out(`
strid - Compile-time string hashing for C-family sources

USAGE:
  strid <command> [options] <paths...>

COMMANDS:
  run      Rewrite SID("...") invocations in place (default)
  check    Report files that still contain invocations, without writing
  expand   Print a file's preprocessed output
  hash     Print the hash of each argument

OPTIONS:
  -m, --marker <name>    Marker macro name (default: SID)
  -a, --hash <name>      Hash algorithm: djb2 or fnv1a (default: djb2)
  -o, --out-dir <dir>    Write results under <dir> instead of in place
  -e, --ext <list>       Comma-separated extensions to visit in directories
  --source-map           Write a .map file beside each rewritten file
  --detect-collisions    Fail files whose strings collide with earlier ones
  --diff                 Show a line diff (expand command)
  -v, --verbose          Enable verbose logging
  -h, --help             Show this help message

Options can also be set in .stridrc, package.json#strid or STRID_* variables.

EXAMPLES:
  strid src
  strid check src include
  strid run --out-dir build/gen src
  strid expand --diff src/game.c
  strid hash player.jump
`);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function reportDiagnostic(diagnostic: RichDiagnostic, io: CliIO): void {
  io.err(renderDiagnosticCLI(diagnostic, { colors: io.colors }));
  io.err("");
}

function reportConfigError(error: ConfigError, io: CliIO): void {
  reportDiagnostic(new DiagnosticBuilder(STRID1101).withArgs({ detail: error.message }).build(), io);
}

interface RunContext {
  config: ResolvedStridConfig;
  /** Base for the --out-dir layout of file arguments */
  cwd: string;
  io: CliIO;
  log: (message: string) => void;
}

/**
 * `run` and `check`: preprocess every file, continuing past failures.
 */
function processFiles(
  options: CliOptions,
  { config, cwd, io, log }: RunContext,
  dryRun: boolean
): number {
  const files = collectFiles(options.paths, config.extensions, cwd);
  const hash = HASH_ALGORITHMS[config.hash];
  const collisions = config.detectCollisions ? createCollisionRegistry() : undefined;
  const outDir = dryRun ? undefined : options.outDir;

  if (outDir) {
    const seen = new Map<string, string>();
    for (const file of files) {
      const destination = path.resolve(outDir, file.relative);
      const other = seen.get(destination);
      if (other !== undefined) {
        throw new UsageError(
          `${other} and ${file.path} would both be written to ${path.join(outDir, file.relative)}`
        );
      }
      seen.set(destination, file.path);
    }
  }

  log(`Processing ${plural(files.length, "file")} (marker ${config.marker}, hash ${config.hash})`);

  let modified = 0;
  let failed = 0;

  for (const file of files) {
    const destination = outDir ? path.join(outDir, file.relative) : file.path;
    const result = preprocessFile(file.path, destination, {
      marker: config.marker,
      hash,
      sourceMap: config.sourceMap,
      collisions,
      dryRun,
      createDirectories: outDir !== undefined,
    });

    if (!result.ok) {
      failed++;
      reportDiagnostic(result.error.toDiagnostic(), io);
      continue;
    }

    const strings = plural(result.invocations.length, "string");
    if (result.modified) {
      modified++;
      io.out(dryRun ? `${file.path}: ${strings} to hash` : `${destination}: hashed ${strings}`);
      continue;
    }

    if (outDir && path.resolve(destination) !== path.resolve(file.path)) {
      try {
        fs.mkdirSync(path.dirname(destination), { recursive: true });
        fs.copyFileSync(file.path, destination);
      } catch (error) {
        failed++;
        reportDiagnostic(destinationUnwritable(destination, error).toDiagnostic(), io);
        continue;
      }
    }
    log(`${file.path}: unchanged`);
  }

  if (failed > 0) {
    io.err(`[strid] Found ${plural(failed, "error")} in ${plural(files.length, "file")}.`);
  }
  log(`${plural(files.length, "file")} processed, ${modified} ${dryRun ? "to rewrite" : "rewritten"}.`);

  return failed > 0 || (dryRun && modified > 0) ? 1 : 0;
}

function expand(options: CliOptions, { config, io }: RunContext): number {
  if (options.paths.length !== 1) {
    throw new UsageError("expand requires a single file argument: strid expand <file>");
  }

  const diagnostic = runExpand(
    {
      file: options.paths[0],
      diff: options.diff,
      marker: config.marker,
      hash: HASH_ALGORITHMS[config.hash],
    },
    io
  );
  if (diagnostic) {
    reportDiagnostic(diagnostic, io);
    return 1;
  }
  return 0;
}

function hashTexts(options: CliOptions, { config, io }: RunContext): number {
  if (options.paths.length === 0) {
    throw new UsageError("hash requires at least one argument: strid hash <text...>");
  }

  const hash = HASH_ALGORITHMS[config.hash];
  for (const text of options.paths) {
    io.out(`${formatHash(hashString(text, hash))}  ${text}`);
  }
  return 0;
}

export interface RunCliOptions {
  /** Directory searched for a config file (default: process.cwd()) */
  cwd?: string;
  /** Environment read for STRID_* variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Run the CLI and return its exit code.
 *
 * Exit codes: 0 on success, 1 when a file failed, `check` found work to do,
 * or the command line or configuration was rejected.
 */
export function runCli(args: readonly string[], io: CliIO, runOptions: RunCliOptions = {}): number {
  try {
    const options = parseArgs(args);

    if (args.length === 0 || options.help) {
      printHelp(io);
      return 0;
    }

    const loaded: LoadedConfig = loadConfig({
      cwd: runOptions.cwd,
      env: runOptions.env,
      overrides: options.overrides,
    });
    const { config } = loaded;
    const log = (message: string): void => {
      if (config.verbose) io.out(`[strid] ${message}`);
    };

    if (loaded.filePath) {
      log(`Using config: ${loaded.filePath}`);
    }

    const context: RunContext = { config, cwd: runOptions.cwd ?? process.cwd(), io, log };

    switch (options.command) {
      case "run":
      case "check":
        if (options.paths.length === 0) {
          throw new UsageError(`${options.command} requires at least one file or directory`);
        }
        return processFiles(options, context, options.command === "check");
      case "expand":
        return expand(options, context);
      case "hash":
        return hashTexts(options, context);
    }
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`${error.message}\n${USAGE}`);
      return 1;
    }
    if (error instanceof ConfigError) {
      reportConfigError(error, io);
      return 1;
    }
    throw error;
  }
}
