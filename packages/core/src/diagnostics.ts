/**
 * Diagnostics System for strid
 *
 * Provides structured, Rust-style error messages with:
 * - Stable error codes (STRID1001-STRID1999)
 * - A primary span pointing into the offending source file
 * - Notes and help text
 * - A colored CLI renderer
 *
 * Spans carry a *byte string* (one code unit per byte, as produced by a
 * latin1 decode) because the preprocessor scans raw bytes. The renderer
 * decodes each displayed line as UTF-8.
 *
 * @example
 * ```typescript
 * const diagnostic = new DiagnosticBuilder(STRID1004)
 *   .at({ fileName: "src/game.c", text, start: 42, length: 3 })
 *   .withArgs({ literal: "jump" })
 *   .help("Close the invocation with `)`")
 *   .build();
 *
 * console.error(renderDiagnosticCLI(diagnostic));
 * ```
 */

import { decodeByteString } from "./bytes.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Input = "input",
  Syntax = "syntax",
  Output = "output",
  Collision = "collision",
  Configuration = "config",
}

export type DiagnosticSeverity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 1001-1999 */
  readonly code: number;

  /** Default severity */
  readonly severity: DiagnosticSeverity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation, shown with --explain style output */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A region of a source file. `text` is the whole file as a byte string;
 * `start` and `length` are byte offsets into it.
 */
export interface SourceSpan {
  fileName: string;
  text: string;
  start: number;
  length: number;
}

export interface RichDiagnostic {
  code: number;
  severity: DiagnosticSeverity;
  category: DiagnosticCategory;
  /** Primary message (with placeholders interpolated) */
  message: string;
  /** File the diagnostic belongs to, even when no span is available */
  fileName?: string;
  primarySpan?: SourceSpan;
  /** Text printed under the primary span's underline */
  label?: string;
  notes: string[];
  help?: string;
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(private readonly descriptor: DiagnosticDescriptor) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(span: SourceSpan): this {
    this.diagnostic.primarySpan = span;
    this.diagnostic.fileName = span.fileName;
    return this;
  }

  /**
   * Attach a file name without a span (e.g. an unreadable file).
   */
  inFile(fileName: string): this {
    this.diagnostic.fileName = fileName;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  label(message: string): this {
    this.diagnostic.label = message;
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.split(`{${key}}`).join(value);
    }
    return message;
  }

  build(): RichDiagnostic {
    return { ...this.diagnostic, message: this.interpolateMessage() };
  }
}

// ============================================================================
// Error Catalog: Input and Invocation Syntax (1001-1099)
// ============================================================================

export const STRID1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Input,
  messageTemplate: "Could not read input file `{path}`",
  explanation: `The source file could not be opened or read.

The file is skipped; other files in the same run are still processed.
Check that the path exists and is readable.`,
};

export const STRID1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "Only string literals can be placed inside `{marker}(...)`",
  explanation: `The marker must wrap a single double-quoted string literal.

Correct:
  SID("player.jump")

Incorrect:
  SID(42)
  SID(name)

The whole file is left untouched.`,
};

export const STRID1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "Unterminated string literal inside `{marker}(...)`",
  explanation: `The string literal was never closed before the end of the file.

A backslash always escapes the byte that follows it, so a literal ending
in \\" is still open. The whole file is left untouched.`,
};

export const STRID1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "Expected `)` after the string \"{literal}\" in `{marker}(...)`",
  explanation: `Only whitespace may follow the string literal before the closing
parenthesis.

Incorrect:
  SID("a" "b")
  SID("a", 1)

The whole file is left untouched.`,
};

// ============================================================================
// Error Catalog: Output (1005-1009)
// ============================================================================

export const STRID1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Output,
  messageTemplate: "Could not write output file `{path}`",
  explanation: `The rewritten file could not be written to its destination.

Check that the directory exists and is writable.`,
};

export const STRID1006: DiagnosticDescriptor = {
  code: 1006,
  severity: "error",
  category: DiagnosticCategory.Collision,
  messageTemplate: "Hash {hash} of \"{literal}\" collides with \"{existing}\"",
  explanation: `Two different strings produced the same hash value.

Collision checks only run when detectCollisions is enabled. Rename one of
the strings, or switch to another hash algorithm.`,
};

// ============================================================================
// Error Catalog: Configuration (1101-1199)
// ============================================================================

export const STRID1101: DiagnosticDescriptor = {
  code: 1101,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "Invalid configuration: {detail}",
  explanation: `A configuration value from a config file, a STRID_* environment
variable or a command-line flag was rejected.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: Map<number, DiagnosticDescriptor> = new Map([
  [STRID1001.code, STRID1001],
  [STRID1002.code, STRID1002],
  [STRID1003.code, STRID1003],
  [STRID1004.code, STRID1004],
  [STRID1005.code, STRID1005],
  [STRID1006.code, STRID1006],
  [STRID1101.code, STRID1101],
]);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return [...DIAGNOSTIC_CATALOG.values()].filter((d) => d.category === category);
}

/** `1004` → `"STRID1004"` */
export function formatDiagnosticCode(code: number): string {
  return `STRID${code}`;
}

// ============================================================================
// Positions
// ============================================================================

/**
 * 1-based line and byte column of an offset.
 */
export function getLineAndColumn(text: string, offset: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart + 1 };
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or STRID_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

export function colorsEnabledByEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return !env.NO_COLOR && !env.STRID_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: DiagnosticSeverity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function lineBounds(text: string, offset: number): { start: number; end: number } {
  let start = Math.min(offset, text.length);
  while (start > 0 && text.charCodeAt(start - 1) !== 10) start--;
  let end = Math.min(offset, text.length);
  while (end < text.length && text.charCodeAt(end) !== 10) end++;
  // CRLF files: keep the carriage return out of the rendered line
  if (end > start && text.charCodeAt(end - 1) === 13) end--;
  return { start, end };
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect from the environment) */
  colors?: boolean;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
}

/**
 * Render a RichDiagnostic to CLI output in Rust-style format.
 *
 * @example Output:
 * ```
 * error[STRID1004]: Expected `)` after the string "jump" in `SID(...)`
 *   --> src/game.c:3:5
 *      |
 *    3 | x = SID("jump";
 *      |     ^^^^^^^^^^^ expected `)`
 *      |
 *    = help: Close the invocation with `)`
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {}
): string {
  const useColors = options.colors ?? colorsEnabledByEnv();
  const color = (text: string, ...styles: ColorName[]): string => {
    if (!useColors) return text;
    return `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}`;
  };

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);
  const code = formatDiagnosticCode(diagnostic.code);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${code}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  const span = diagnostic.primarySpan;
  if (span) {
    const { line, column } = getLineAndColumn(span.text, span.start);
    lines.push(`  ${color("-->", "blue")} ${span.fileName}:${line}:${column}`);

    const bounds = lineBounds(span.text, span.start);
    const lineText = decodeByteString(span.text.slice(bounds.start, bounds.end));
    const prefix = decodeByteString(span.text.slice(bounds.start, span.start));
    const spanEnd = Math.min(span.start + span.length, bounds.end);
    const underlined = decodeByteString(span.text.slice(span.start, spanEnd));

    const numWidth = Math.max(3, String(line).length);
    const gutter = " ".repeat(numWidth);
    const bar = color("|", "blue");

    lines.push(` ${gutter} ${bar}`);
    lines.push(` ${color(String(line).padStart(numWidth, " "), "blue")} ${bar} ${lineText}`);
    const underline = " ".repeat(prefix.length) + "^".repeat(Math.max(1, underlined.length));
    const label = diagnostic.label ? ` ${diagnostic.label}` : "";
    lines.push(` ${gutter} ${bar} ${color(underline + label, severityClr)}`);
    lines.push(` ${gutter} ${bar}`);
  } else if (diagnostic.fileName) {
    lines.push(`  ${color("-->", "blue")} ${diagnostic.fileName}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (options.showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: RichDiagnostic[],
  options: CLIRenderOptions = {}
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const useColors = options.colors ?? colorsEnabledByEnv();
  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) {
    const text = `${errorCount} error${errorCount > 1 ? "s" : ""}`;
    parts.push(useColors ? `${COLORS.bold}${COLORS.red}${text}${COLORS.reset}` : text);
  }
  if (warnCount > 0) {
    const text = `${warnCount} warning${warnCount > 1 ? "s" : ""}`;
    parts.push(useColors ? `${COLORS.bold}${COLORS.yellow}${text}${COLORS.reset}` : text);
  }

  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}
