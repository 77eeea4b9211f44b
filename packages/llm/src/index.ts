/**
 * @bridge-analyst/llm - Text generation for bridge analysis
 *
 * This package provides:
 * - An OpenAI SDK client usable against any OpenAI-compatible endpoint
 * - Prompt templates for board analysis and post-mortem reports
 * - A report generator that degrades to an inline error string
 */

export const VERSION = '0.1.0';

// Client
export { OpenAIClient } from './client/openai-client.js';

// Configuration
export {
  type LLMConfig,
  DEFAULT_LLM_CONFIG,
  GEMINI_OPENAI_BASE_URL,
  createLLMConfig,
} from './config/llm-config.js';

// Errors
export { LLMError, LLMErrorCode, RateLimitError, TimeoutError, APIError } from './errors.js';

// Prompts
export { BRIDGE_REPORT_SYSTEM } from './prompts/system-prompts.js';
export {
  type BoardInfoOptions,
  type ReportPromptOptions,
  DEFAULT_REPORT_PLAY_CARDS,
  formatBoardInfo,
  formatKeyMoments,
  buildStandalonePrompt,
  buildEngineAssistedPrompt,
  buildReportPrompt,
} from './prompts/templates.js';

// Generator
export {
  type ReportGeneratorOptions,
  LLM_NOT_CONFIGURED_REPORT,
  ReportGenerator,
} from './generator/report-generator.js';

export type {
  TextGenerationRequest,
  TextGenerationResult,
  TextGenerator,
} from '@bridge-analyst/types';
