/**
 * Configuration schema types for the Bridge Analyst service
 */

/**
 * Log levels, most verbose first
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * HTTP listener configuration
 */
export interface ServerConfigSchema {
  /** Interface to bind */
  host: string;
  /** Port to listen on */
  port: number;
}

/**
 * Analysis engine configuration
 */
export interface EngineConfigSchema {
  /** Engine base URL; the engine is disabled when unset */
  baseUrl?: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Request timeout for the full report pipeline in milliseconds */
  reportTimeoutMs: number;
}

/**
 * Text-generation configuration
 */
export interface LLMConfigSchema {
  /** API key; text generation is disabled when unset */
  apiKey?: string;
  /** Base URL of an OpenAI-compatible API */
  baseUrl: string;
  /** Model to use */
  model: string;
  /** Temperature for generation (0.0-2.0) */
  temperature: number;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Completion token cap */
  maxTokens?: number;
}

/**
 * Report prompt configuration
 */
export interface ReportConfigSchema {
  /** Played cards shown in the report prompt */
  maxPlayCards: number;
}

/**
 * Logging configuration
 */
export interface LoggingConfigSchema {
  level: LogLevel;
  /** Colorize log output */
  color: boolean;
}

/**
 * Complete configuration
 */
export interface BridgeAnalystConfig {
  server: ServerConfigSchema;
  engine: EngineConfigSchema;
  llm: LLMConfigSchema;
  report: ReportConfigSchema;
  logging: LoggingConfigSchema;
}

/**
 * Command-line overrides
 */
export interface CliOptions {
  /** Path to config file */
  config?: string | undefined;
  host?: string | undefined;
  port?: number | undefined;
  /** Engine base URL */
  engineUrl?: string | undefined;
  logLevel?: LogLevel | undefined;
  /** Disable colored output */
  noColor?: boolean | undefined;
  /** Print the resolved configuration and exit */
  showConfig?: boolean | undefined;
}
