#!/usr/bin/env tsx
/**
 * hashcommit CLI Entry Point
 *
 * @module hashcommit-cli
 */

import { createProgram } from '../src/program.js';
import { EXIT_CODES, errorMessage } from '../src/lib/errors.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
