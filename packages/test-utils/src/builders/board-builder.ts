/**
 * Fluent builder for BoardRecord test data
 */

import type { BoardRecord, Call, CardToken, Hands, Seat } from '@bridge-analyst/types';

/**
 * A complete deal used as the default board, indexed [N, E, S, W]
 */
export const SAMPLE_HANDS: Hands = [
  'AJ87632.J96.753.',
  'K9.Q8542.T6.AJ74',
  'QT4.A.KJ94.KQ986',
  '5.KT73.AQ82.T532',
];

/**
 * Fluent builder for creating BoardRecord instances
 */
export class BoardBuilder {
  private record: BoardRecord;

  constructor() {
    this.record = {
      dealer: 'N',
      vuln: [false, false],
      hands: [...SAMPLE_HANDS],
      auction: [],
      play: [],
    };
  }

  withDealer(dealer: Seat): this {
    this.record.dealer = dealer;
    return this;
  }

  withVulnerability(ns: boolean, ew: boolean): this {
    this.record.vuln = [ns, ew];
    return this;
  }

  withHands(hands: Hands): this {
    this.record.hands = [...hands];
    return this;
  }

  withAuction(...calls: Call[]): this {
    this.record.auction = calls;
    return this;
  }

  withPlay(...cards: CardToken[]): this {
    this.record.play = cards;
    return this;
  }

  /**
   * Merge metadata or any other fields
   */
  with(fields: Partial<BoardRecord>): this {
    this.record = { ...this.record, ...fields };
    return this;
  }

  build(): BoardRecord {
    return {
      ...this.record,
      vuln: [...this.record.vuln],
      hands: [...this.record.hands],
      auction: [...this.record.auction],
      play: [...this.record.play],
    };
  }
}

/**
 * Shorthand for `new BoardBuilder()`
 */
export function board(): BoardBuilder {
  return new BoardBuilder();
}
