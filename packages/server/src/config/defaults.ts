/**
 * Default configuration values
 */

import { DEFAULT_ENGINE_CONFIG } from '@bridge-analyst/engine-client';
import { DEFAULT_LLM_CONFIG, DEFAULT_REPORT_PLAY_CARDS } from '@bridge-analyst/llm';

import type {
  BridgeAnalystConfig,
  EngineConfigSchema,
  LLMConfigSchema,
  LoggingConfigSchema,
  ReportConfigSchema,
  ServerConfigSchema,
} from './schema.js';

export const DEFAULT_SERVER_CONFIG: ServerConfigSchema = {
  host: '0.0.0.0',
  port: 5000,
};

export const DEFAULT_ENGINE_SETTINGS: EngineConfigSchema = {
  timeoutMs: DEFAULT_ENGINE_CONFIG.timeoutMs,
  reportTimeoutMs: 300000,
};

export const DEFAULT_LLM_SETTINGS: LLMConfigSchema = {
  baseUrl: DEFAULT_LLM_CONFIG.baseUrl,
  model: DEFAULT_LLM_CONFIG.model,
  temperature: DEFAULT_LLM_CONFIG.temperature,
  timeout: DEFAULT_LLM_CONFIG.timeout,
};

export const DEFAULT_REPORT_CONFIG: ReportConfigSchema = {
  maxPlayCards: DEFAULT_REPORT_PLAY_CARDS,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfigSchema = {
  level: 'info',
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: BridgeAnalystConfig = {
  server: DEFAULT_SERVER_CONFIG,
  engine: DEFAULT_ENGINE_SETTINGS,
  llm: DEFAULT_LLM_SETTINGS,
  report: DEFAULT_REPORT_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};
