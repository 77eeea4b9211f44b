/**
 * Mock analysis engine for testing
 *
 * Implements the AnalysisEngine interface the server is built on
 */

import type {
  AnalysisEngine,
  BoardRecord,
  EngineAnalysisResult,
  EngineRequestOptions,
} from '@bridge-analyst/types';
import { vi } from 'vitest';

import { engineAnalysis } from '../builders/engine-analysis-builder.js';

export interface MockEngineConfig {
  /** Result returned for every board */
  result?: EngineAnalysisResult;
}

/**
 * Create a mock engine that answers every board with the same result
 */
export function createMockEngine(config: MockEngineConfig = {}) {
  const { result = engineAnalysis().build() } = config;

  const analyze = vi.fn(
    async (_board: BoardRecord, _options?: EngineRequestOptions): Promise<EngineAnalysisResult> =>
      result,
  );

  const engine: AnalysisEngine & { analyze: typeof analyze } = { analyze };
  return engine;
}

export type MockEngine = ReturnType<typeof createMockEngine>;
