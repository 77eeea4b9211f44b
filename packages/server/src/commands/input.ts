/**
 * Reading PBN input files
 */

import * as fs from 'node:fs';

import { InputError, resolveAbsolutePath } from '../errors/cli-errors.js';

export function readPbnFile(file: string): string {
  const fullPath = resolveAbsolutePath(file);
  if (!fs.existsSync(fullPath)) {
    throw new InputError(`Input file not found: ${fullPath}`, 'Check the file path and try again');
  }
  return fs.readFileSync(fullPath, 'utf-8');
}
