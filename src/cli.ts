#!/usr/bin/env node
/**
 * CLI entry point for safecrate.
 */

import { reportError } from "./error-handler.js";
import { createProgram } from "./program.js";

// Parse and run (async for proper error handling in async actions)
createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.exitCode = reportError(error);
  });
