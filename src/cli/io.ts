import { colorsEnabledByEnv } from "@strid/core";

/**
 * Where the CLI writes. Results go to `out`, diagnostics to `err`.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Emit ANSI colors */
  colors: boolean;
}

export function createConsoleIO(env: NodeJS.ProcessEnv = process.env): CliIO {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    colors: Boolean(process.stderr.isTTY) && colorsEnabledByEnv(env),
  };
}
