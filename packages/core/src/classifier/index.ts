export {
  extractKeyMoments,
  extractBiddingMoments,
  extractCardPlayMoments,
  summarizeMoments,
  trickNumber,
} from './key-moment-extractor.js';
export {
  KEY_MOMENT_THRESHOLDS,
  roundImp,
  type KeyMomentThresholds,
} from './thresholds.js';
