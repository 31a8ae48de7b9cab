#!/usr/bin/env node

/**
 * Paper CLI - Main entry point
 */

import { createProgram } from './program.js';
import { defaultContext } from './runner.js';

/**
 * Main CLI program
 */
async function main(): Promise<void> {
  const program = createProgram(defaultContext());

  // Show help if no command provided
  if (process.argv.slice(2).length === 0) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(3);
});
