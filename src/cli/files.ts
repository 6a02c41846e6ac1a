/**
 * Input discovery for the CLI.
 */

import * as fs from "fs";
import * as path from "path";

export interface InputFile {
  /** Path as given (or joined onto a given directory) */
  path: string;
  /**
   * Path used under --out-dir: relative to the directory argument it came
   * from, or for a file argument, relative to `cwd` (its base name when
   * it lies outside `cwd`)
   */
  relative: string;
}

const SKIPPED_DIRECTORIES = new Set(["node_modules"]);

/**
 * Expand the CLI's path arguments into a list of files.
 *
 * Files named explicitly are always included, whatever their extension, and
 * so are paths that cannot be read; preprocessing reports those. Directories
 * are walked recursively in name order, keeping files whose extension is in
 * `extensions` and skipping `node_modules` and dot-directories.
 */
export function collectFiles(
  inputs: readonly string[],
  extensions: readonly string[],
  cwd: string = process.cwd()
): InputFile[] {
  const files: InputFile[] = [];
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));

  for (const input of inputs) {
    let stat: fs.Stats | undefined;
    try {
      stat = fs.statSync(input);
    } catch {
      stat = undefined;
    }

    if (stat?.isDirectory()) {
      walk(input, input, wanted, files);
    } else {
      files.push({ path: input, relative: relativeToCwd(input, cwd) });
    }
  }

  return files;
}

function walk(root: string, dir: string, wanted: Set<string>, files: InputFile[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch {
    // Let the preprocessor report the unreadable path
    files.push({ path: dir, relative: path.relative(root, dir) || path.basename(dir) });
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name.startsWith(".") || SKIPPED_DIRECTORIES.has(entry.name)) continue;
      walk(root, full, wanted, files);
    } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
      files.push({ path: full, relative: path.relative(root, full) });
    }
  }
}

function relativeToCwd(input: string, cwd: string): string {
  const relative = path.relative(cwd, path.resolve(cwd, input));
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return path.basename(input);
  }
  return relative;
}
