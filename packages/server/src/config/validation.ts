/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { BridgeAnalystConfig } from './schema.js';

/**
 * Port number schema (0-65535; 0 picks an ephemeral port)
 */
const portSchema = z.number().int().min(0).max(65535);

/**
 * Timeout schema in milliseconds
 */
const timeoutSchema = z.number().int().min(1);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const serverConfigSchema = z.object({
  host: z.string().min(1),
  port: portSchema,
});

export const engineConfigSchema = z.object({
  baseUrl: z.string().url().optional(),
  timeoutMs: timeoutSchema,
  reportTimeoutMs: timeoutSchema,
});

export const llmConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  timeout: timeoutSchema,
  maxTokens: z.number().int().min(1).optional(),
});

export const reportConfigSchema = z.object({
  maxPlayCards: z.number().int().min(1),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema,
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  server: serverConfigSchema,
  engine: engineConfigSchema,
  llm: llmConfigSchema,
  report: reportConfigSchema,
  logging: loggingConfigSchema,
});

/**
 * Partial configuration schema (for config files and overrides)
 */
export const partialConfigSchema = z.object({
  server: serverConfigSchema.partial().optional(),
  engine: engineConfigSchema.partial().optional(),
  llm: llmConfigSchema.partial().optional(),
  report: reportConfigSchema.partial().optional(),
  logging: loggingConfigSchema.partial().optional(),
});

export type PartialConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): BridgeAnalystConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
