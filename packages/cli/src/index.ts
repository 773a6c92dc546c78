#!/usr/bin/env node

/**
 * tbx CLI - Endgame tablebase explorer
 *
 * Main entry point for the tbx command-line interface.
 */

import { createProgram } from './cli.js';
import { createHandlers } from './commands/index.js';
import { handleError } from './errors/index.js';

export { VERSION } from './cli.js';

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  try {
    const program = createProgram(createHandlers());
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error);
  }
}

// Run if executed directly
main().catch(handleError);
