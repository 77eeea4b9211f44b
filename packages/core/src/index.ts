/**
 * @bridge-analyst/core - Key moment extraction
 *
 * Turns an engine analysis into a ranked list of bidding and card-play
 * mistakes.
 */

export const VERSION = '0.1.0';

export * from './classifier/index.js';

export type {
  KeyMoment,
  KeyMomentKind,
  KeyMomentSeverity,
  KeyMomentSummary,
  MomentAlternative,
} from '@bridge-analyst/types';
