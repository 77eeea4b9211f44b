/**
 * Deal-string sub-parser
 *
 * Handles both the standard form with a single leading seat marker
 * ("S:hand hand hand hand", clockwise from S) and the per-seat form
 * ("N:hand E:hand S:hand W:hand").
 */

import { SEATS, isSeat, type Hands, type Seat } from '@bridge-analyst/types';

import type { PbnWarning } from '../index.js';

const SEAT_MARKER = /([NESW]):(\S*)/gi;
const LEADING_MARKER = /^([NESW]):/i;

/**
 * Result of parsing a [Deal] value
 */
export interface DealParseResult {
  hands: Hands;
  warnings: PbnWarning[];
}

/**
 * The seat to the left of `seat` (clockwise)
 */
export function nextSeat(seat: Seat): Seat {
  const index = SEATS.indexOf(seat);
  return SEATS[(index + 1) % 4] ?? 'N';
}

function seatIndex(seat: Seat): number {
  return SEATS.indexOf(seat);
}

function toSeat(value: string | undefined): Seat | undefined {
  const upper = (value ?? '').toUpperCase();
  return isSeat(upper) ? upper : undefined;
}

/**
 * Parse a [Deal] tag value into the four hands
 *
 * Hand strings are stored as written; suit and rank legality is not
 * checked here.
 *
 * @param value - Tag value, e.g. "N:AKQ.J.T9.8 2.3.4.5 6.7.8.9 T.J.Q.K"
 * @param line - Source line, used for warnings
 */
export function parseDeal(value: string, line: number = 0): DealParseResult {
  const hands: Hands = ['', '', '', ''];
  const warnings: PbnWarning[] = [];
  const trimmed = value.trim();

  const markers = [...trimmed.matchAll(SEAT_MARKER)];
  if (markers.length > 1) {
    for (const match of markers) {
      const seat = toSeat(match[1]);
      if (seat) {
        hands[seatIndex(seat)] = match[2] ?? '';
      }
    }
    return { hands, warnings };
  }

  let seat: Seat = 'N';
  let rest = trimmed;
  const leading = LEADING_MARKER.exec(trimmed);
  const leadingSeat = toSeat(leading?.[1]);
  if (leading && leadingSeat) {
    seat = leadingSeat;
    rest = trimmed.slice(leading[0].length);
  } else if (trimmed) {
    warnings.push({ line, message: 'Deal has no seat marker, assuming North first' });
  }

  const handStrings = rest.split(/\s+/).filter((h) => h.length > 0);
  if (handStrings.length > 4) {
    warnings.push({
      line,
      message: `Deal has ${handStrings.length} hands, ignoring all after the fourth`,
    });
  }

  for (const hand of handStrings.slice(0, 4)) {
    hands[seatIndex(seat)] = hand;
    seat = nextSeat(seat);
  }

  return { hands, warnings };
}
