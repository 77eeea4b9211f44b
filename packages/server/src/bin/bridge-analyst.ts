#!/usr/bin/env node

/**
 * Bridge Analyst CLI entry point
 */

import { createProgram } from '../cli.js';
import { handleError } from '../errors/handler.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch(handleError);
