/**
 * Fluent builder for engine analysis results
 */

import type {
  BidAnalysisEntry,
  BidCandidate,
  CardAnalysisEntry,
  CardCandidate,
  EngineAnalysisFailure,
  EngineAnalysisSuccess,
} from '@bridge-analyst/types';

/**
 * Fluent builder for successful EngineAnalysisResult instances
 *
 * Card entries are recorded in the order they are added, one per played card.
 */
export class EngineAnalysisBuilder {
  private readonly bids: BidAnalysisEntry[] = [];
  private readonly cards: CardAnalysisEntry[] = [];

  /**
   * Add a bid entry; the first candidate is the engine's choice
   */
  bid(bid: string, candidates: Array<string | BidCandidate>, quality?: number): this {
    const entry: BidAnalysisEntry = {
      bid,
      candidates: candidates.map((c) => (typeof c === 'string' ? { call: c } : c)),
    };
    if (quality !== undefined) {
      entry.quality = quality;
    }
    this.bids.push(entry);
    return this;
  }

  /**
   * Add a card entry
   *
   * @param candidates - `[card, expectedScoreImp]` pairs, best first
   */
  card(
    played: string,
    recommended: string,
    candidates: Array<[string, number]> = [],
    who = 'NN',
  ): this {
    this.cards.push({
      played,
      recommended,
      who,
      candidates: candidates.map(([card, expectedScoreImp]): CardCandidate => ({
        card,
        expectedScoreImp,
      })),
    });
    return this;
  }

  /**
   * Add a card entry where the played card matches the engine's choice
   */
  agreedCard(played: string, who = 'NN'): this {
    return this.card(played, played, [[played, 0]], who);
  }

  /**
   * Add a card-play mistake costing exactly `cost` IMPs
   */
  cardMistake(played: string, recommended: string, cost: number): this {
    return this.card(played, recommended, [
      [recommended, cost],
      [played, 0],
    ]);
  }

  build(): EngineAnalysisSuccess {
    return {
      success: true,
      bidAnalysis: this.bids.map((b) => ({ ...b, candidates: [...b.candidates] })),
      cardAnalysis: this.cards.map((c) => ({ ...c, candidates: [...c.candidates] })),
      raw: {},
    };
  }
}

/**
 * Shorthand for `new EngineAnalysisBuilder()`
 */
export function engineAnalysis(): EngineAnalysisBuilder {
  return new EngineAnalysisBuilder();
}

/**
 * A failed engine analysis
 */
export function failedAnalysis(error = 'Engine unavailable'): EngineAnalysisFailure {
  return { success: false, error };
}
