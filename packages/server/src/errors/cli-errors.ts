/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}
