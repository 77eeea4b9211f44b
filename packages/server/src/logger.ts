/**
 * Leveled console logger with chalk colors
 */

import chalk from 'chalk';
import type { NextFunction, Request, Response } from 'express';

import type { LogLevel } from './config/schema.js';

/**
 * Numeric order of levels; messages below the logger's level are dropped
 */
const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type ColorFn = (text: string) => string;

interface ColorFunctions {
  dim: ColorFn;
  level: Record<Exclude<LogLevel, 'silent'>, ColorFn>;
}

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      dim: (text) => chalk.dim(text),
      level: {
        debug: (text) => chalk.gray(text),
        info: (text) => chalk.cyan(text),
        warn: (text) => chalk.yellow(text),
        error: (text) => chalk.red(text),
      },
    };
  }
  const identity = (text: string): string => text;
  return {
    dim: identity,
    level: { debug: identity, info: identity, warn: identity, error: identity },
  };
}

/**
 * Destination for formatted lines
 */
export interface LogSink {
  log(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  color?: boolean;
  /** Defaults to the global console */
  sink?: LogSink;
  /** Clock used for timestamps */
  now?: () => Date;
}

export type LogFields = Record<string, string | number | boolean | undefined>;

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

/**
 * Logger writing one line per message
 *
 * warn and error go to the sink's error stream, the rest to its log stream.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly now: () => Date;
  private readonly c: ColorFunctions;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? console;
    this.now = options.now ?? (() => new Date());
    this.c = createColorFns(options.color ?? true);
  }

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const line = `${this.c.dim(this.now().toISOString())} ${this.c.level[level](level.toUpperCase().padEnd(5))} ${message}${formatFields(fields)}`;
    if (level === 'warn' || level === 'error') {
      this.sink.error(line);
    } else {
      this.sink.log(line);
    }
  }
}

/**
 * Express middleware logging method, path, status and duration of each request
 */
export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
      const fields: LogFields = { status: res.statusCode, ms: durationMs.toFixed(1) };
      if (res.statusCode >= 500) {
        logger.error(`${req.method} ${req.originalUrl}`, fields);
      } else if (res.statusCode >= 400) {
        logger.warn(`${req.method} ${req.originalUrl}`, fields);
      } else {
        logger.info(`${req.method} ${req.originalUrl}`, fields);
      }
    });
    next();
  };
}
