import { createEmptyBoard, isSeat, type BoardRecord, type Vulnerability } from '@bridge-analyst/types';

import type { PbnParseResult, PbnWarning } from '../index.js';

import { parseDeal } from './deal-parser.js';
import { isValidCall, isValidCard, normalizeCall } from './tokens.js';

/**
 * A tag line: [Tag "value"]
 */
const TAG_PATTERN = /^\[(\w+)\s+"([^"]*)"\]$/;

/**
 * Which token section the parser is in
 */
type Section = 'none' | 'auction' | 'play';

/**
 * Tags copied verbatim onto the board
 */
const VERBATIM_TAGS = [
  'contract',
  'event',
  'site',
  'date',
  'board',
  'north',
  'south',
  'east',
  'west',
] as const;

type VerbatimTag = (typeof VERBATIM_TAGS)[number];

function isVerbatimTag(tag: string): tag is VerbatimTag {
  return (VERBATIM_TAGS as readonly string[]).includes(tag);
}

/**
 * Map a [Vulnerable] value to (NS, EW)
 *
 * "All"/"Both" -> both, "NS", "EW"; anything else (None, Love, "-",
 * unknown values) -> neither.
 */
export function parseVulnerability(value: string): Vulnerability {
  switch (value.trim().toLowerCase()) {
    case 'all':
    case 'both':
      return [true, true];
    case 'ns':
      return [true, false];
    case 'ew':
      return [false, true];
    default:
      return [false, false];
  }
}

/**
 * Parse PBN text into a board record
 *
 * Best effort: never throws. Unrecognized lines are ignored, malformed
 * calls and cards are dropped, and every dropped token is reported as a
 * warning. Fields without a source keep the defaults of `createEmptyBoard`.
 *
 * @param text - PBN content for a single board
 * @returns The board and the non-fatal warnings collected on the way
 */
export function parsePbnString(text: string): PbnParseResult {
  const board = createEmptyBoard();
  const warnings: PbnWarning[] = [];
  let section: Section = 'none';

  const lines = text.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (!line) {
      return;
    }

    const tag = TAG_PATTERN.exec(line);
    if (tag) {
      section = applyTag(board, tag[1] ?? '', tag[2] ?? '', lineNumber, warnings);
      return;
    }

    if (section === 'auction') {
      readCalls(board, line, lineNumber, warnings);
    } else if (section === 'play') {
      readCards(board, line, lineNumber, warnings);
    }
  });

  return { board, warnings };
}

/**
 * Apply one tag to the board and return the section that follows it
 */
function applyTag(
  board: BoardRecord,
  name: string,
  value: string,
  line: number,
  warnings: PbnWarning[],
): Section {
  const tag = name.toLowerCase();

  if (isVerbatimTag(tag)) {
    board[tag] = value;
    return 'none';
  }

  switch (tag) {
    case 'dealer': {
      const dealer = value.trim().toUpperCase();
      if (isSeat(dealer)) {
        board.dealer = dealer;
      } else {
        warnings.push({ line, message: `Unknown dealer "${value}"` });
      }
      return 'none';
    }
    case 'vulnerable':
      board.vuln = parseVulnerability(value);
      return 'none';
    case 'deal': {
      const deal = parseDeal(value, line);
      board.hands = deal.hands;
      warnings.push(...deal.warnings);
      return 'none';
    }
    case 'declarer':
      board.declarer = value.toUpperCase();
      return 'none';
    case 'result': {
      const tricks = Number.parseInt(value, 10);
      if (Number.isNaN(tricks)) {
        warnings.push({ line, message: `Non-numeric result "${value}"` });
      } else {
        board.result = tricks;
      }
      return 'none';
    }
    case 'auction':
      board.auctionStart = value;
      return 'auction';
    case 'play':
      board.playStart = value;
      return 'play';
    default:
      return 'none';
  }
}

function readCalls(
  board: BoardRecord,
  line: string,
  lineNumber: number,
  warnings: PbnWarning[],
): void {
  for (const token of line.split(/\s+/)) {
    const call = normalizeCall(token);
    if (isValidCall(call)) {
      board.auction.push(call);
    } else {
      warnings.push({ line: lineNumber, message: `Dropped auction token "${token}"` });
    }
  }
}

function readCards(
  board: BoardRecord,
  line: string,
  lineNumber: number,
  warnings: PbnWarning[],
): void {
  for (const token of line.split(/\s+/)) {
    const card = token.toUpperCase();
    if (isValidCard(card)) {
      board.play.push(card);
    } else {
      warnings.push({ line: lineNumber, message: `Dropped play token "${token}"` });
    }
  }
}

/**
 * Whether a board carries hands (North populated)
 */
export function hasHands(board: BoardRecord): boolean {
  return board.hands[0].trim().length > 0;
}
