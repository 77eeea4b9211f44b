/**
 * OpenAI SDK wrapper implementing the text-generation contract
 *
 * Any OpenAI-compatible endpoint works; the default is Gemini's.
 */

import type {
  TextGenerationRequest,
  TextGenerationResult,
  TextGenerator,
} from '@bridge-analyst/types';
import OpenAILib from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import type { LLMConfig } from '../config/llm-config.js';
import { APIError, LLMError, LLMErrorCode, RateLimitError, TimeoutError } from '../errors.js';

/**
 * Default wait suggested for a rate-limited request without a retry-after header
 */
const DEFAULT_RETRY_AFTER_MS = 5000;

/**
 * Text generator backed by the OpenAI SDK
 *
 * One attempt per request: the SDK's own retries are disabled.
 */
export class OpenAIClient implements TextGenerator {
  private readonly client: OpenAILib;
  private readonly config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
    this.client = new OpenAILib({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout,
      maxRetries: 0,
    });
  }

  /**
   * Send a single chat completion request
   *
   * @throws LLMError (or a subclass) on any failure
   */
  async generate(request: TextGenerationRequest): Promise<TextGenerationResult> {
    const messages: ChatCompletionMessageParam[] = [];
    if (request.system) {
      messages.push({ role: 'system', content: request.system });
    }
    messages.push({ role: 'user', content: request.prompt });

    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages,
        temperature: request.temperature ?? this.config.temperature,
        max_tokens: request.maxTokens ?? this.config.maxTokens ?? null,
      });

      const choice = response.choices[0];
      if (!choice) {
        throw new LLMError('No response from LLM', LLMErrorCode.INVALID_RESPONSE);
      }

      return {
        text: choice.message.content ?? '',
        finishReason: this.mapFinishReason(choice.finish_reason),
        totalTokens: response.usage?.total_tokens ?? 0,
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  /**
   * Model requests are sent to
   */
  get model(): string {
    return this.config.model;
  }

  private mapError(error: unknown): LLMError {
    if (error instanceof LLMError) {
      return error;
    }

    if (error instanceof OpenAILib.APIConnectionTimeoutError) {
      return new TimeoutError('generate', this.config.timeout, error);
    }

    if (error instanceof OpenAILib.APIError) {
      if (error.status === 429) {
        return new RateLimitError(this.parseRetryAfter(error.headers), error);
      }

      if (error.status === 408) {
        return new TimeoutError('generate', this.config.timeout, error);
      }

      return new APIError(error.message, error.status, error);
    }

    return new LLMError(
      error instanceof Error ? error.message : String(error),
      LLMErrorCode.API_ERROR,
      error instanceof Error ? error : undefined,
    );
  }

  private parseRetryAfter(headers: Record<string, string | null | undefined> | undefined): number {
    const retryAfter = headers?.['retry-after'];
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) {
        return seconds * 1000;
      }
    }
    return DEFAULT_RETRY_AFTER_MS;
  }

  private mapFinishReason(reason: string | null): TextGenerationResult['finishReason'] {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
