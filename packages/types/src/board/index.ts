/**
 * Board record types
 *
 * The canonical in-memory form of one deal: dealer, vulnerability,
 * the four hands, the auction and the card play.
 */

/**
 * A seat at the table
 */
export type Seat = 'N' | 'E' | 'S' | 'W';

/**
 * Seats in clockwise order, matching the index order of `BoardRecord.hands`
 */
export const SEATS: readonly Seat[] = ['N', 'E', 'S', 'W'];

/**
 * Vulnerability as [North-South vulnerable, East-West vulnerable]
 */
export type Vulnerability = [ns: boolean, ew: boolean];

/**
 * The four hands indexed [N, E, S, W]
 *
 * Each hand is a suit-segmented string "spades.hearts.diamonds.clubs";
 * any segment may be empty (void).
 */
export type Hands = [north: string, east: string, south: string, west: string];

/**
 * A call in the auction: "1C".."7N", "PASS", "X" (double) or "XX" (redouble)
 */
export type Call = string;

/**
 * A played card: suit letter followed by rank letter, e.g. "SA", "D7", "CT"
 */
export type CardToken = string;

/**
 * Optional descriptive fields carried over from PBN tags
 */
export interface BoardMetadata {
  event?: string;
  site?: string;
  date?: string;
  /** Board number as written in the source */
  board?: string;
  north?: string;
  east?: string;
  south?: string;
  west?: string;
  contract?: string;
  declarer?: string;
  /** Tricks taken by declarer */
  result?: number;
  /** Value of the [Auction] tag (the seat that made the first call) */
  auctionStart?: string;
  /** Value of the [Play] tag (the opening leader) */
  playStart?: string;
}

/**
 * One deal of bridge
 */
export interface BoardRecord extends BoardMetadata {
  dealer: Seat;
  vuln: Vulnerability;
  hands: Hands;
  auction: Call[];
  play: CardToken[];
}

/**
 * Create an empty board with documented defaults
 */
export function createEmptyBoard(): BoardRecord {
  return {
    dealer: 'N',
    vuln: [false, false],
    hands: ['', '', '', ''],
    auction: [],
    play: [],
  };
}

/**
 * Check whether a string names a seat
 */
export function isSeat(value: string): value is Seat {
  return value === 'N' || value === 'E' || value === 'S' || value === 'W';
}
