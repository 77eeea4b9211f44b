/**
 * @bridge-analyst/engine-client - HTTP client for the bridge analysis engine
 *
 * This package provides:
 * - The engine client (board in, typed analysis out, failures as results)
 * - Zod schemas for the engine's response
 * - A plain-text formatter for engine analyses
 */

export const VERSION = '0.1.0';

export {
  AnalysisEngineClient,
  DEFAULT_ENGINE_CONFIG,
  ANALYZE_PATH,
  toEngineRequest,
  type AnalysisEngineConfig,
  type EngineRequest,
} from './clients/index.js';

export { parseEngineResponse, engineResponseSchema, type EngineResponse } from './schemas.js';

export { formatEngineAnalysis } from './formatter.js';

export { fetchJson } from './fetch-json.js';

export {
  EngineClientError,
  EngineHttpError,
  EngineTimeoutError,
  EngineResponseError,
} from './errors.js';
