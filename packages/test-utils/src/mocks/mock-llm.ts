/**
 * Mock text generator for testing
 */

import type {
  TextGenerationRequest,
  TextGenerationResult,
  TextGenerator,
} from '@bridge-analyst/types';
import { vi } from 'vitest';

export interface MockTextGeneratorConfig {
  /** Text returned for every prompt */
  text?: string;
  /** Simulate failures */
  shouldFail?: boolean;
  /** Message of the simulated failure */
  failureMessage?: string;
}

/**
 * Default completion text
 */
export const DEFAULT_MOCK_COMPLETION = 'Mock analysis for testing';

/**
 * Create a mock text generator
 */
export function createMockTextGenerator(config: MockTextGeneratorConfig = {}) {
  const {
    text = DEFAULT_MOCK_COMPLETION,
    shouldFail = false,
    failureMessage = 'Text generation failed',
  } = config;

  const generate = vi.fn(async (_request: TextGenerationRequest): Promise<TextGenerationResult> => {
    if (shouldFail) {
      throw new Error(failureMessage);
    }

    return { text, finishReason: 'stop', totalTokens: 150 };
  });

  const generator: TextGenerator & { generate: typeof generate } = { generate };
  return generator;
}

export type MockTextGenerator = ReturnType<typeof createMockTextGenerator>;
