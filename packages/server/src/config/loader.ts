/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { DEFAULT_CONFIG } from './defaults.js';
import type { BridgeAnalystConfig, CliOptions } from './schema.js';
import { type PartialConfig, validateConfig, validatePartialConfig } from './validation.js';

/**
 * Environment variables read at start-up
 */
export const ENV_VARS = [
  'PORT',
  'HOST',
  'BEN_API_URL',
  'ENGINE_TIMEOUT_MS',
  'GEMINI_API_KEY',
  'LLM_API_KEY',
  'LLM_BASE_URL',
  'LLM_MODEL',
  'LLM_TIMEOUT_MS',
  'LOG_LEVEL',
] as const;

export type Environment = Partial<Record<(typeof ENV_VARS)[number], string>>;

/**
 * Deep merge a partial config over a complete one
 * Source values override target values
 */
function deepMerge(target: BridgeAnalystConfig, source: PartialConfig): BridgeAnalystConfig {
  return {
    server: { ...target.server, ...source.server },
    engine: { ...target.engine, ...source.engine },
    llm: { ...target.llm, ...source.llm },
    report: { ...target.report, ...source.report },
    logging: { ...target.logging, ...source.logging },
  };
}

/**
 * Read a variable, treating an empty value as unset
 */
function read(env: Environment, name: keyof Environment): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parse a numeric variable; a non-numeric value is kept as NaN and
 * rejected by validation with the variable's config path
 */
function readNumber(env: Environment, name: keyof Environment): number | undefined {
  const value = read(env, name);
  return value === undefined ? undefined : Number(value);
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: Environment): PartialConfig {
  const config: PartialConfig = {};

  const host = read(env, 'HOST');
  const port = readNumber(env, 'PORT');
  if (host !== undefined || port !== undefined) {
    config.server = {};
    if (host !== undefined) config.server.host = host;
    if (port !== undefined) config.server.port = port;
  }

  const baseUrl = read(env, 'BEN_API_URL');
  const timeoutMs = readNumber(env, 'ENGINE_TIMEOUT_MS');
  if (baseUrl !== undefined || timeoutMs !== undefined) {
    config.engine = {};
    if (baseUrl !== undefined) config.engine.baseUrl = baseUrl;
    if (timeoutMs !== undefined) config.engine.timeoutMs = timeoutMs;
  }

  const llm: NonNullable<PartialConfig['llm']> = {};
  // LLM_API_KEY takes precedence so a non-Gemini provider can be configured alongside
  const apiKey = read(env, 'LLM_API_KEY') ?? read(env, 'GEMINI_API_KEY');
  const llmBaseUrl = read(env, 'LLM_BASE_URL');
  const model = read(env, 'LLM_MODEL');
  const timeout = readNumber(env, 'LLM_TIMEOUT_MS');
  if (apiKey !== undefined) llm.apiKey = apiKey;
  if (llmBaseUrl !== undefined) llm.baseUrl = llmBaseUrl;
  if (model !== undefined) llm.model = model;
  if (timeout !== undefined) llm.timeout = timeout;
  if (Object.keys(llm).length > 0) {
    config.llm = llm;
  }

  const level = read(env, 'LOG_LEVEL');
  if (level !== undefined) {
    // Narrowed to a LogLevel by validation
    config.logging = validatePartialConfig({ logging: { level: level.toLowerCase() } }).logging;
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('bridgeanalyst', {
    searchPlaces: [
      'package.json',
      '.bridgeanalystrc',
      '.bridgeanalystrc.json',
      '.bridgeanalystrc.yaml',
      '.bridgeanalystrc.yml',
      '.bridgeanalystrc.js',
      '.bridgeanalystrc.cjs',
      'bridgeanalyst.config.js',
      'bridgeanalyst.config.cjs',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search();
  if (!result || result.isEmpty) {
    return null;
  }

  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
function mapCliToConfig(options: CliOptions): PartialConfig {
  const config: PartialConfig = {};

  if (options.host !== undefined || options.port !== undefined) {
    config.server = {};
    if (options.host !== undefined) config.server.host = options.host;
    if (options.port !== undefined) config.server.port = options.port;
  }

  if (options.engineUrl !== undefined) {
    config.engine = { baseUrl: options.engineUrl };
  }

  if (options.logLevel !== undefined || options.noColor) {
    config.logging = {};
    if (options.logLevel !== undefined) config.logging.level = options.logLevel;
    if (options.noColor) config.logging.color = false;
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions = {},
  env: Environment = process.env,
): Promise<BridgeAnalystConfig> {
  let config = deepMerge(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display, with secrets masked
 */
export function formatConfig(config: BridgeAnalystConfig): string {
  const masked = {
    ...config,
    llm: { ...config.llm, apiKey: config.llm.apiKey ? '********' : undefined },
  };
  return JSON.stringify(masked, null, 2);
}
