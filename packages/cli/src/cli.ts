#!/usr/bin/env node

/**
 * treeorder CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram, type GlobalOptions } from "./program.js";
import { mapErrorToExitCode, formatCliError } from "./lib/errors.js";

// Top-level error handler
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // commander has already written usage errors, help and version output
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    process.exit(mapErrorToExitCode(err));
  }
}

void main();
