/**
 * Key moment thresholds
 *
 * Card-play costs are in IMPs; bid quality is the engine's [0, 1] score.
 */

export interface KeyMomentThresholds {
  /** A card-play deviation is recorded only above this cost */
  minCardCost: number;
  /** A card-play moment is major above this cost */
  majorCardCost: number;
  /** A bidding moment is major below this quality */
  majorBidQuality: number;
  /** Number of engine alternatives kept per moment */
  maxAlternatives: number;
}

export const KEY_MOMENT_THRESHOLDS: KeyMomentThresholds = {
  minCardCost: 0.5,
  majorCardCost: 2.0,
  majorBidQuality: 0.8,
  maxAlternatives: 4,
};

/**
 * Round an IMP value to 2 decimals
 */
export function roundImp(value: number): number {
  return Math.round(value * 100) / 100;
}
