/**
 * Tests for the OpenAI client wrapper
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

import { OpenAIClient } from '../client/openai-client.js';
import { createLLMConfig } from '../config/llm-config.js';
import { APIError, LLMError, LLMErrorCode, RateLimitError, TimeoutError } from '../errors.js';

import {
  MockAPIConnectionTimeoutError,
  MockAPIError,
  MockOpenAI,
  completion,
  mockCreate,
} from './mocks/mock-openai.js';

vi.mock('openai', async () => (await import('./mocks/mock-openai.js')).createMockOpenAI());

describe('OpenAIClient', () => {
  const config = createLLMConfig({ apiKey: 'test-secret', timeout: 5000 });

  beforeEach(() => {
    mockCreate.mockReset();
    MockOpenAI.mockClear();
  });

  it('configures the SDK for a single attempt against the configured endpoint', () => {
    new OpenAIClient(config);

    expect(MockOpenAI).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai/',
      timeout: 5000,
      maxRetries: 0,
    });
  });

  it('sends the prompt as a user message and returns the text', async () => {
    mockCreate.mockResolvedValue(completion('Declarer misplayed trick 3'));
    const client = new OpenAIClient(config);

    const result = await client.generate({ prompt: 'Analyze this board' });

    expect(result).toEqual({
      text: 'Declarer misplayed trick 3',
      finishReason: 'stop',
      totalTokens: 150,
    });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gemini-1.5-flash',
      messages: [{ role: 'user', content: 'Analyze this board' }],
      temperature: 0.7,
      max_tokens: null,
    });
  });

  it('prepends the system prompt and honours request overrides', async () => {
    mockCreate.mockResolvedValue(completion('ok', 'length'));
    const client = new OpenAIClient({ ...config, maxTokens: 800 });

    const result = await client.generate({
      prompt: 'Report',
      system: 'Be brief',
      temperature: 0.2,
    });

    expect(result.finishReason).toBe('length');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gemini-1.5-flash',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Report' },
      ],
      temperature: 0.2,
      max_tokens: 800,
    });
  });

  it('returns empty text for a null message', async () => {
    mockCreate.mockResolvedValue(completion(null));
    const client = new OpenAIClient(config);

    await expect(client.generate({ prompt: 'x' })).resolves.toMatchObject({ text: '' });
  });

  it('rejects with INVALID_RESPONSE when there are no choices', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const client = new OpenAIClient(config);

    const error = await client.generate({ prompt: 'x' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LLMError);
    expect(error).toHaveProperty('code', LLMErrorCode.INVALID_RESPONSE);
  });

  it('maps 429 to RateLimitError using retry-after', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(429, 'quota', { 'retry-after': '7' }));
    const client = new OpenAIClient(config);

    const error = await client.generate({ prompt: 'x' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toHaveProperty('retryAfterMs', 7000);
    expect(mockCreate).toHaveBeenCalledTimes(1);
  });

  it('maps connection timeouts to TimeoutError', async () => {
    mockCreate.mockRejectedValue(new MockAPIConnectionTimeoutError());
    const client = new OpenAIClient(config);

    const error = await client.generate({ prompt: 'x' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty('message', "Operation 'generate' timed out after 5000ms");
  });

  it('maps other API errors to APIError with the status', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(401, 'invalid api key'));
    const client = new OpenAIClient(config);

    const error = await client.generate({ prompt: 'x' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({ statusCode: 401, message: 'invalid api key' });
  });

  it('wraps unknown errors as LLMError', async () => {
    const socketError = new Error('socket hang up');
    mockCreate.mockRejectedValue(socketError);
    const client = new OpenAIClient(config);

    const error = await client.generate({ prompt: 'x' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LLMError);
    expect(error).toMatchObject({ code: LLMErrorCode.API_ERROR, message: 'socket hang up' });
    expect(error).toHaveProperty('cause', socketError);
  });
});
