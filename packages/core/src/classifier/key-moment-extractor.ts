/**
 * Key Moment Extraction
 *
 * Compares the recorded auction and play against the engine's top
 * recommendations and ranks the deviations by IMP cost.
 */

import {
  isForcedPlay,
  type BidAnalysisEntry,
  type CardAnalysisEntry,
  type EngineAnalysisResult,
  type KeyMoment,
  type KeyMomentSummary,
} from '@bridge-analyst/types';

import {
  KEY_MOMENT_THRESHOLDS,
  roundImp,
  type KeyMomentThresholds,
} from './thresholds.js';

/**
 * Trick number for a 1-based play position
 */
export function trickNumber(position: number): number {
  return Math.ceil(position / 4);
}

/**
 * Expected score of `card` in a candidate list, 0 when it is not listed
 */
function candidateScore(entry: CardAnalysisEntry, card: string): number {
  return entry.candidates.find((c) => c.card === card)?.expectedScoreImp ?? 0;
}

/**
 * Bidding moments, in auction order
 *
 * Bidding cost is not quantified by the engine, so every bidding moment
 * costs 0; severity comes from the engine's quality score.
 */
export function extractBiddingMoments(
  entries: BidAnalysisEntry[],
  thresholds: KeyMomentThresholds = KEY_MOMENT_THRESHOLDS,
): KeyMoment[] {
  const moments: KeyMoment[] = [];

  entries.forEach((entry, index) => {
    const best = entry.candidates[0];
    if (!best || best.call === entry.bid) {
      return;
    }

    const moment: KeyMoment = {
      kind: 'bidding',
      position: index + 1,
      actual: entry.bid,
      recommended: best.call,
      cost: 0,
      severity:
        entry.quality !== undefined && entry.quality < thresholds.majorBidQuality
          ? 'major'
          : 'minor',
      alternatives: entry.candidates.slice(0, thresholds.maxAlternatives).map((c) =>
        c.expectedScore !== undefined
          ? { action: c.call, score: roundImp(c.expectedScore) }
          : { action: c.call },
      ),
    };
    if (entry.quality !== undefined) moment.quality = entry.quality;
    const explanation = best.explanation ?? entry.explanation;
    if (explanation) moment.explanation = explanation;

    moments.push(moment);
  });

  return moments;
}

/**
 * Card-play moments, in play order
 *
 * Forced plays are skipped; a deviation is kept only when it costs more
 * than `minCardCost`.
 */
export function extractCardPlayMoments(
  entries: CardAnalysisEntry[],
  thresholds: KeyMomentThresholds = KEY_MOMENT_THRESHOLDS,
): KeyMoment[] {
  const moments: KeyMoment[] = [];

  entries.forEach((entry, index) => {
    const position = index + 1;
    if (isForcedPlay(entry) || entry.played === entry.recommended) {
      return;
    }

    // Thresholds apply to the rounded cost, the value that is reported
    const cost = roundImp(
      candidateScore(entry, entry.recommended) - candidateScore(entry, entry.played),
    );
    if (cost <= thresholds.minCardCost) {
      return;
    }

    moments.push({
      kind: 'card_play',
      position,
      trick: trickNumber(position),
      actual: entry.played,
      recommended: entry.recommended,
      cost,
      severity: cost > thresholds.majorCardCost ? 'major' : 'minor',
      alternatives: entry.candidates.slice(0, thresholds.maxAlternatives).map((c) => ({
        action: c.card,
        score: roundImp(c.expectedScoreImp),
      })),
    });
  });

  return moments;
}

/**
 * Extract key moments from an engine analysis
 *
 * @param result - Engine analysis; an unsuccessful result yields no moments
 * @returns Bidding and card-play moments, most expensive first. The sort
 *   is stable, so equal costs keep auction-then-play order.
 */
export function extractKeyMoments(
  result: EngineAnalysisResult,
  thresholds: KeyMomentThresholds = KEY_MOMENT_THRESHOLDS,
): KeyMoment[] {
  if (!result.success) {
    return [];
  }

  const moments = [
    ...extractBiddingMoments(result.bidAnalysis, thresholds),
    ...extractCardPlayMoments(result.cardAnalysis, thresholds),
  ];

  return moments.sort((a, b) => b.cost - a.cost);
}

/**
 * Count the moments and total their IMP cost
 */
export function summarizeMoments(moments: KeyMoment[]): KeyMomentSummary {
  return {
    totalMistakes: moments.length,
    totalImpCost: roundImp(moments.reduce((sum, m) => sum + m.cost, 0)),
  };
}
