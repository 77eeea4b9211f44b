/**
 * Parse command implementation
 */

import { parsePbn } from '@bridge-analyst/pbn';

import { readPbnFile } from './input.js';

export async function parseCommand(file: string): Promise<void> {
  const { board, warnings } = parsePbn(readPbnFile(file));
  process.stdout.write(`${JSON.stringify({ board, warnings }, null, 2)}\n`);
}
