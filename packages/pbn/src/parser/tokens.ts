/**
 * Call and card token normalization
 */

const CALL_ALIASES: Record<string, string> = {
  P: 'PASS',
  PASS: 'PASS',
  X: 'X',
  DBL: 'X',
  DOUBLE: 'X',
  XX: 'XX',
  RDBL: 'XX',
  REDOUBLE: 'XX',
};

const BID_PATTERN = /^[1-7][CDHSN]$/;

/**
 * Valid suit letters
 */
export const SUITS = 'SHDC';

/**
 * Valid rank letters, lowest first
 */
export const RANKS = '23456789TJQKA';

/**
 * Normalize a raw auction token
 *
 * Uppercases, maps pass/double/redouble spellings to PASS/X/XX and
 * writes a notrump strain as N ("1NT" -> "1N"). The result is not
 * guaranteed to be a valid call; check it with `isValidCall`.
 */
export function normalizeCall(token: string): string {
  const upper = token.trim().toUpperCase();
  const alias = CALL_ALIASES[upper];
  if (alias !== undefined) {
    return alias;
  }
  if (/^[1-7]NT$/.test(upper)) {
    return upper.slice(0, 2);
  }
  return upper;
}

/**
 * Check whether a normalized call is PASS, X, XX or a level+strain bid
 */
export function isValidCall(call: string): boolean {
  return call === 'PASS' || call === 'X' || call === 'XX' || BID_PATTERN.test(call);
}

/**
 * Check whether a token is a 2-character card (suit letter, rank letter)
 */
export function isValidCard(token: string): boolean {
  if (token.length !== 2) {
    return false;
  }
  const suit = token.charAt(0);
  const rank = token.charAt(1);
  return SUITS.includes(suit) && RANKS.includes(rank);
}
