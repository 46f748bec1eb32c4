#!/usr/bin/env node
/**
 * groundcheck CLI - Ask the Core graph before stating anything
 *
 * Usage:
 *   groundcheck [repl]           Interactive session (default)
 *   groundcheck query <command>  Run one command, e.g. `query lookup 1`
 *   groundcheck status           Graph status and developmental stage
 *   groundcheck config           Resolved configuration, secrets redacted
 */

import { createProgram } from './program.js';
import { createLogger, EXIT_CODES, registerShutdownHandlers, wrapError } from './lib/index.js';

registerShutdownHandlers(() => {
  process.exit(EXIT_CODES.INTERRUPTED);
});

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const wrapped = wrapError(error);
    createLogger({ level: 'error' }).logError(wrapped);
    process.exitCode = wrapped.exitCode;
  }
}

void main();
