/**
 * HTTP client for the bridge analysis engine
 */

import type {
  AnalysisEngine,
  BoardRecord,
  EngineAnalysisResult,
  EngineRequestOptions,
} from '@bridge-analyst/types';

import { fetchJson } from '../fetch-json.js';
import { parseEngineResponse } from '../schemas.js';

/**
 * Configuration for the analysis engine client
 */
export interface AnalysisEngineConfig {
  /** Base URL of the engine, e.g. "http://localhost:8085" */
  baseUrl: string;
  /** Default request timeout in milliseconds */
  timeoutMs?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
}

/**
 * Default client settings
 */
export const DEFAULT_ENGINE_CONFIG = {
  timeoutMs: 120000,
  headers: {
    'Content-Type': 'application/json',
    // The engine is commonly exposed through an ngrok tunnel
    'ngrok-skip-browser-warning': 'true',
  },
} as const;

/**
 * Path of the engine's manual-board analysis endpoint
 */
export const ANALYZE_PATH = '/api/analyze/manual';

/**
 * Request body the engine expects
 */
export interface EngineRequest {
  dealer: BoardRecord['dealer'];
  vuln: BoardRecord['vuln'];
  hands: BoardRecord['hands'];
  auction: BoardRecord['auction'];
  play: BoardRecord['play'];
}

/**
 * Strip metadata from a board, keeping the fields the engine reads
 */
export function toEngineRequest(board: BoardRecord): EngineRequest {
  return {
    dealer: board.dealer,
    vuln: board.vuln,
    hands: board.hands,
    auction: board.auction,
    play: board.play,
  };
}

/**
 * Client for the analysis engine
 *
 * Every failure (network, timeout, HTTP status, malformed body) is
 * returned as an unsuccessful result; `analyze` never rejects.
 */
export class AnalysisEngineClient implements AnalysisEngine {
  private readonly config: Required<AnalysisEngineConfig>;

  constructor(config: AnalysisEngineConfig) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? DEFAULT_ENGINE_CONFIG.timeoutMs,
      headers: { ...DEFAULT_ENGINE_CONFIG.headers, ...config.headers },
    };
  }

  /**
   * Analyze a board with the engine
   */
  async analyze(
    board: BoardRecord,
    options: EngineRequestOptions = {},
  ): Promise<EngineAnalysisResult> {
    try {
      const body = await fetchJson(
        this.endpoint,
        {
          method: 'POST',
          headers: this.config.headers,
          body: JSON.stringify(toEngineRequest(board)),
        },
        options.timeoutMs ?? this.config.timeoutMs,
      );
      return parseEngineResponse(body);
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Full URL of the analysis endpoint
   */
  get endpoint(): string {
    return `${this.config.baseUrl}${ANALYZE_PATH}`;
  }

  /**
   * Default request timeout
   */
  get timeoutMs(): number {
    return this.config.timeoutMs;
  }
}
