/**
 * Service interfaces
 *
 * Contracts for the two external collaborators, so that callers can be
 * handed a real client or an in-process fake.
 */

import type { EngineAnalysisResult } from '../analysis/index.js';
import type { BoardRecord } from '../board/index.js';

/**
 * Options for a single engine request
 */
export interface EngineRequestOptions {
  /** Override the client's default timeout */
  timeoutMs?: number;
}

/**
 * Bridge analysis engine
 */
export interface AnalysisEngine {
  /** Analyze a board; never rejects, failures are returned as results */
  analyze(board: BoardRecord, options?: EngineRequestOptions): Promise<EngineAnalysisResult>;
}

/**
 * Request to a text-generation service
 */
export interface TextGenerationRequest {
  prompt: string;
  /** Optional system instruction */
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Completion returned by a text-generation service
 */
export interface TextGenerationResult {
  text: string;
  finishReason: 'stop' | 'length' | 'content_filter';
  totalTokens: number;
}

/**
 * Text-generation service
 */
export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<TextGenerationResult>;
}
