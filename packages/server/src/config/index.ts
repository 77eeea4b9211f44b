/**
 * Configuration module exports
 */

// Schema types
export type {
  LogLevel,
  ServerConfigSchema,
  EngineConfigSchema,
  LLMConfigSchema,
  ReportConfigSchema,
  LoggingConfigSchema,
  BridgeAnalystConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_SERVER_CONFIG,
  DEFAULT_ENGINE_SETTINGS,
  DEFAULT_LLM_SETTINGS,
  DEFAULT_REPORT_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  logLevelSchema,
  type PartialConfig,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export {
  ENV_VARS,
  type Environment,
  loadConfig,
  loadEnvConfig,
  formatConfig,
} from './loader.js';
