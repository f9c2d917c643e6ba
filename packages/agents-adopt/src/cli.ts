#!/usr/bin/env node

/**
 * CLI entry point for agents-adopt.
 */

import { createProgram } from './commands.js';
import { formatError } from './format.js';
import { AdoptError } from './types.js';

export async function main(): Promise<void> {
  const program = createProgram({ pager: process.env.PAGER });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (err instanceof AdoptError) {
    console.error(formatError(err));
    process.exitCode = err.exitCode;
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
});
