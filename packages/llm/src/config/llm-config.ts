/**
 * Configuration types and defaults for text generation
 */

/**
 * Gemini's OpenAI-compatible endpoint
 */
export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

/**
 * Main LLM configuration
 */
export interface LLMConfig {
  /** API key (required) */
  apiKey: string;
  /** Base URL of an OpenAI-compatible API (default: Gemini) */
  baseUrl: string;
  /** Model to use (default: 'gemini-1.5-flash') */
  model: string;
  /** Temperature for generation (default: 0.7) */
  temperature: number;
  /** Request timeout in milliseconds (default: 600000) */
  timeout: number;
  /** Completion token cap; unset leaves it to the provider */
  maxTokens?: number;
}

/**
 * Default LLM configuration (requires apiKey to be provided)
 */
export const DEFAULT_LLM_CONFIG: Omit<LLMConfig, 'apiKey'> = {
  baseUrl: GEMINI_OPENAI_BASE_URL,
  model: 'gemini-1.5-flash',
  temperature: 0.7,
  timeout: 600000,
};

/**
 * Create a full LLM config with defaults for unspecified values
 */
export function createLLMConfig(partial: Partial<LLMConfig> & { apiKey: string }): LLMConfig {
  return {
    ...DEFAULT_LLM_CONFIG,
    ...partial,
  };
}
