#!/usr/bin/env node

/**
 * strid CLI entry point. See ./run.ts for commands and options.
 */

import { createConsoleIO } from "./io.js";
import { runCli } from "./run.js";

process.exitCode = runCli(process.argv.slice(2), createConsoleIO());
