/**
 * Engine analysis and key moment types
 */

import type { Call, CardToken } from '../board/index.js';

/**
 * A candidate call ranked by the engine
 */
export interface BidCandidate {
  call: Call;
  explanation?: string;
  /** Expected score of the call, when the engine reports one */
  expectedScore?: number;
}

/**
 * Engine verdict on one call of the auction
 */
export interface BidAnalysisEntry {
  /** The call actually made */
  bid: Call;
  /** Engine quality score in [0, 1]; absent when not reported */
  quality?: number;
  /** Ranked candidates, best first */
  candidates: BidCandidate[];
  explanation?: string;
}

/**
 * A candidate card ranked by the engine
 */
export interface CardCandidate {
  card: CardToken;
  /** Expected score in IMPs */
  expectedScoreImp: number;
}

/**
 * Engine verdict on one played card
 */
export interface CardAnalysisEntry {
  /** The card actually played */
  played: CardToken;
  /** The card the engine recommends */
  recommended: CardToken;
  /** Who/why marker; "Forced" and "Follow" mark plays with no real choice */
  who: string;
  /** Ranked candidates, best first */
  candidates: CardCandidate[];
}

/**
 * "who" markers for plays the engine considers forced
 */
export const FORCED_PLAY_MARKERS: ReadonlySet<string> = new Set(['Forced', 'Follow']);

/**
 * Whether the engine marked a card as played without a real choice
 */
export function isForcedPlay(entry: CardAnalysisEntry): boolean {
  return FORCED_PLAY_MARKERS.has(entry.who);
}

/**
 * Successful engine analysis
 */
export interface EngineAnalysisSuccess {
  success: true;
  bidAnalysis: BidAnalysisEntry[];
  /** Card entries in recorded play order */
  cardAnalysis: CardAnalysisEntry[];
  /** The engine's response body as received */
  raw: unknown;
}

/**
 * Failed engine analysis (transport, HTTP or engine-reported error)
 */
export interface EngineAnalysisFailure {
  success: false;
  error: string;
  /** The engine's response body, when one was received */
  raw?: unknown;
}

/**
 * Result of one engine analysis request
 */
export type EngineAnalysisResult = EngineAnalysisSuccess | EngineAnalysisFailure;

/**
 * Kind of decision a key moment refers to
 */
export type KeyMomentKind = 'bidding' | 'card_play';

/**
 * How costly a key moment is
 */
export type KeyMomentSeverity = 'minor' | 'major';

/**
 * A ranked engine alternative
 */
export interface MomentAlternative {
  /** Call or card */
  action: string;
  /** Expected score, rounded to 2 decimals */
  score?: number;
}

/**
 * A decision where the recorded action differs from the engine's top choice
 */
export interface KeyMoment {
  kind: KeyMomentKind;
  /** 1-based index into the auction or the play */
  position: number;
  /** Trick number (card play only) */
  trick?: number;
  actual: string;
  recommended: string;
  /** IMP cost of the actual choice; 0 for bidding */
  cost: number;
  severity: KeyMomentSeverity;
  alternatives: MomentAlternative[];
  /** Engine quality score (bidding only) */
  quality?: number;
  /** Engine explanation of the recommended call (bidding only) */
  explanation?: string;
}

/**
 * Totals over a list of key moments
 */
export interface KeyMomentSummary {
  totalMistakes: number;
  totalImpCost: number;
}
