/**
 * @bridge-analyst/pbn - PBN parsing for bridge boards
 *
 * This package handles:
 * - PBN tag parsing (Dealer, Vulnerable, Deal, Contract, players, ...)
 * - Auction sections (call normalization)
 * - Play sections (card token validation)
 */

import type { BoardRecord } from '@bridge-analyst/types';

export const VERSION = '0.1.0';

/**
 * A non-fatal problem found while parsing
 */
export interface PbnWarning {
  /** 1-based source line */
  line: number;
  message: string;
}

/**
 * Best-effort parse result
 */
export interface PbnParseResult {
  board: BoardRecord;
  warnings: PbnWarning[];
}

export { parsePbnString as parsePbn, parseVulnerability, hasHands } from './parser/pbn-parser.js';
export { parseDeal, nextSeat } from './parser/deal-parser.js';
export type { DealParseResult } from './parser/deal-parser.js';
export { normalizeCall, isValidCall, isValidCard, SUITS, RANKS } from './parser/tokens.js';
