/**
 * Shared result types for the preprocessor
 */

/**
 * A text replacement in the source. Offsets and text are in byte-string
 * space (one code unit per byte).
 */
export interface Replacement {
  start: number;
  end: number;
  text: string;
}

/**
 * Standard source map v3 format (VLQ-encoded). Columns count bytes.
 */
export interface RawSourceMap {
  version: 3;
  file?: string;
  sourceRoot?: string;
  sources: string[];
  sourcesContent?: (string | null)[];
  names: string[];
  mappings: string;
}
