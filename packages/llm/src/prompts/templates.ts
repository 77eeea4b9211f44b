/**
 * Prompt templates for bridge analysis
 *
 * Every prompt starts from the same board block (dealer, vulnerability,
 * hands, auction, play) and adds engine output and key moments when they
 * are available.
 */

import type { BoardRecord, KeyMoment, MomentAlternative } from '@bridge-analyst/types';

/**
 * Options for rendering the board block
 */
export interface BoardInfoOptions {
  /** Show at most this many played cards, followed by " ..." when cut */
  maxPlayCards?: number;
}

/**
 * Options for the long report prompt
 */
export interface ReportPromptOptions {
  /** Play cards shown in the report prompt (default: 20) */
  maxPlayCards?: number;
}

/**
 * Default number of played cards shown in the report prompt
 */
export const DEFAULT_REPORT_PLAY_CARDS = 20;

function vulLabel(vulnerable: boolean): string {
  return vulnerable ? 'Vul' : 'NV';
}

function formatPlay(play: string[], maxPlayCards: number | undefined): string {
  if (maxPlayCards !== undefined && play.length > maxPlayCards) {
    return `${play.slice(0, maxPlayCards).join(' ')} ...`;
  }
  return play.join(' ');
}

function formatScore(score: number): string {
  return `${score >= 0 ? '+' : ''}${score.toFixed(2)}`;
}

function formatAlternative(alternative: MomentAlternative): string {
  return alternative.score === undefined
    ? alternative.action
    : `${alternative.action}(${formatScore(alternative.score)})`;
}

/**
 * Render the board block shared by all prompts
 */
export function formatBoardInfo(board: BoardRecord, options: BoardInfoOptions = {}): string {
  const [north, east, south, west] = board.hands;
  const [ns, ew] = board.vuln;

  return `**Dealer:** ${board.dealer}
**Vulnerability:** NS=${vulLabel(ns)}, EW=${vulLabel(ew)}

**Hands (Spades.Hearts.Diamonds.Clubs):**
- North: ${north}
- East:  ${east}
- South: ${south}
- West:  ${west}

**Auction:** ${board.auction.join(' - ')}

**Play:** ${formatPlay(board.play, options.maxPlayCards)}
`;
}

/**
 * Render key moments as a text block ending with the total IMP cost
 */
export function formatKeyMoments(moments: KeyMoment[]): string {
  const lines: string[] = ['**Key Moments:**'];
  let total = 0;

  for (const moment of moments) {
    if (moment.kind === 'bidding') {
      lines.push(
        `- Bid #${moment.position}: ${moment.actual} (recommended ${moment.recommended}) [${moment.severity}]`,
      );
    } else {
      lines.push(
        `- Trick ${moment.trick ?? '?'}: ${moment.actual} played (recommended ${moment.recommended}), cost ${moment.cost.toFixed(2)} IMPs [${moment.severity}]`,
      );
    }
    if (moment.alternatives.length > 0) {
      lines.push(`  Alternatives: ${moment.alternatives.map(formatAlternative).join(', ')}`);
    }
    total += moment.cost;
  }

  lines.push('', `Total IMP cost: ${total.toFixed(2)}`);
  return lines.join('\n');
}

/**
 * Board-only analysis request
 */
export function buildStandalonePrompt(board: BoardRecord): string {
  return `You are an expert bridge analyst. Analyze this board:

${formatBoardInfo(board)}

Provide:
1. Bidding analysis - any mistakes?
2. Card play analysis - any errors?
3. Optimal line of play
4. Expected tricks for declarer
5. Overall assessment

Be specific about mistakes and improvements.
`;
}

/**
 * Analysis request that explains the engine's verdicts
 */
export function buildEngineAssistedPrompt(board: BoardRecord, engineText: string): string {
  return `You are an expert bridge analyst with access to BEN, a world-class bridge AI.

${formatBoardInfo(board)}

${engineText}

Using BEN's analysis, provide:
1. Summary of bidding mistakes (if any)
2. Explain WHY BEN's card play recommendations are better
3. Calculate total IMP cost of mistakes
4. Key lessons from this hand
5. Rate declarer's play 1-10

Explain BEN's insights in simple, human-understandable terms.
`;
}

/**
 * Long post-mortem report request
 */
export function buildReportPrompt(
  board: BoardRecord,
  engineText?: string,
  moments?: KeyMoment[],
  options: ReportPromptOptions = {},
): string {
  const sections = [
    'Write a post-mortem report on this board.',
    formatBoardInfo(board, { maxPlayCards: options.maxPlayCards ?? DEFAULT_REPORT_PLAY_CARDS }),
  ];

  if (engineText) {
    sections.push(engineText);
  }
  if (moments && moments.length > 0) {
    sections.push(formatKeyMoments(moments));
  }

  sections.push(`Structure the report as:
1. Contract and auction review
2. Opening lead and defence
3. Declarer play, covering each key moment
4. IMP cost of the mistakes
5. Lessons for the players
`);

  return sections.join('\n\n');
}
