/**
 * Error handling utilities for HTTP responses and CLI output
 */

import chalk from 'chalk';
import type { ErrorRequestHandler } from 'express';

import { ConfigValidationError } from '../config/validation.js';
import type { Logger } from '../logger.js';

import { CliError } from './cli-errors.js';
import { HttpError } from './http-errors.js';

/**
 * A handler's response
 */
export interface HandlerResult {
  status: number;
  body: Record<string, unknown>;
}

/**
 * Status carried by errors from body parsers and other middleware
 */
function errorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }
  return undefined;
}

/**
 * Convert any thrown value into the `{ success: false, error }` envelope
 */
export function toErrorResponse(error: unknown): HandlerResult {
  if (error instanceof HttpError) {
    const body: Record<string, unknown> = { success: false, error: error.message };
    if (error.details !== undefined) {
      body['details'] = error.details;
    }
    return { status: error.status, body };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { status: errorStatus(error) ?? 500, body: { success: false, error: message } };
}

/**
 * Express error middleware writing the error envelope
 */
export function errorMiddleware(logger: Logger): ErrorRequestHandler {
  return (error: unknown, _req, res, _next) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      logger.error('Unhandled error', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    res.status(status).json(body);
  };
}

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}
