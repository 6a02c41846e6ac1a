/**
 * File-level driver
 *
 * One bulk read, an in-memory preprocess, and (only when something was
 * rewritten) one bulk write. The source and destination may be the same
 * path. When nothing matches, the destination is left exactly as it was.
 * A failed call leaves the destination, its source map and the collision
 * registry as they were.
 */

import * as fs from "fs";
import * as path from "path";
import { stageCollisionRegistry } from "@strid/core";
import { preprocess, type PreprocessOptions } from "./preprocess.js";
import { destinationUnwritable, sourceUnreadable, type PreprocessError } from "./errors.js";
import type { Invocation } from "./rewriter.js";
import type { RawSourceMap } from "./types.js";

export interface PreprocessFileOptions extends Omit<PreprocessOptions, "fileName"> {
  /** Compute the outcome without writing anything */
  dryRun?: boolean;
  /** Create the destination's directory if it is missing */
  createDirectories?: boolean;
}

export type FileResult =
  | {
      ok: true;
      /** True when at least one invocation was rewritten */
      modified: boolean;
      invocations: Invocation[];
      /** Rewritten bytes, present when modified */
      output?: Uint8Array;
      map: RawSourceMap | null;
    }
  | { ok: false; error: PreprocessError };

/**
 * Preprocess `sourcePath` and write the result to `destinationPath`.
 *
 * Never throws for file-scoped problems: unreadable input, malformed
 * invocations and failed writes all come back as `{ ok: false, error }`,
 * so a caller can move on to the next file.
 */
export function preprocessFile(
  sourcePath: string,
  destinationPath: string,
  options: PreprocessFileOptions = {}
): FileResult {
  let input: Buffer;
  try {
    input = fs.readFileSync(sourcePath);
  } catch (error) {
    return { ok: false, error: sourceUnreadable(sourcePath, error) };
  }

  const { dryRun, createDirectories, collisions, ...preprocessOptions } = options;
  const staged = collisions && stageCollisionRegistry(collisions);
  const result = preprocess(input, {
    ...preprocessOptions,
    collisions: staged,
    fileName: sourcePath,
  });

  if (!result.ok) {
    return result;
  }

  if (!result.changed) {
    return { ok: true, modified: false, invocations: [], map: null };
  }

  const map = result.map && rebaseSourceMap(result.map, sourcePath, destinationPath);

  if (!dryRun) {
    try {
      if (createDirectories) {
        fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
      }
      const files: PendingWrite[] = [];
      if (map) {
        files.push({ destination: `${destinationPath}.map`, data: JSON.stringify(map) + "\n" });
      }
      // Last, so the rewritten file only lands once everything else has
      files.push({ destination: destinationPath, data: result.output });
      writeAllAtomically(files);
    } catch (error) {
      return { ok: false, error: destinationUnwritable(destinationPath, error) };
    }
  }

  staged?.commit();

  return {
    ok: true,
    modified: true,
    invocations: result.invocations,
    output: result.output,
    map,
  };
}

/** Point the map's source at `sourcePath` as seen from the map beside `destinationPath`. */
function rebaseSourceMap(
  map: RawSourceMap,
  sourcePath: string,
  destinationPath: string
): RawSourceMap {
  const source = path.relative(path.dirname(destinationPath), sourcePath).split(path.sep).join("/");
  return { ...map, file: path.basename(destinationPath), sources: [source] };
}

interface PendingWrite {
  destination: string;
  data: Uint8Array | string;
}

/** Follow symlinks so a linked destination keeps its link. */
function resolveTarget(destination: string): string {
  try {
    return fs.realpathSync(destination);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return destination;
    }
    throw error;
  }
}

/**
 * Write every file to a sibling temp file, then rename them into place in
 * order. An existing destination's permission bits carry over to its
 * replacement. A failure removes all temp files.
 */
function writeAllAtomically(files: PendingWrite[]): void {
  const staged: Array<{ temp: string; target: string }> = [];
  try {
    for (const file of files) {
      const target = resolveTarget(file.destination);
      const temp = `${target}.${process.pid}.tmp`;
      staged.push({ temp, target });
      const existing = fs.statSync(target, { throwIfNoEntry: false });
      if (existing?.isDirectory()) {
        throw Object.assign(new Error(`EISDIR: illegal operation on a directory, '${target}'`), {
          code: "EISDIR",
        });
      }
      fs.writeFileSync(temp, file.data);
      if (existing) {
        fs.chmodSync(temp, existing.mode & 0o7777);
      }
    }
    for (const { temp, target } of staged) {
      fs.renameSync(temp, target);
    }
  } catch (error) {
    for (const { temp } of staged) {
      fs.rmSync(temp, { force: true });
    }
    throw error;
  }
}
