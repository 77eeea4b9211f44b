/**
 * Plain-text rendering of an engine analysis
 *
 * The text is returned to API callers and embedded in LLM prompts.
 */

import { isForcedPlay, type EngineAnalysisResult } from '@bridge-analyst/types';

const RULE = '='.repeat(50);

/**
 * Number of candidates listed under each card-play deviation
 */
const LISTED_CANDIDATES = 3;

function formatImp(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}`;
}

/**
 * Format an engine analysis as readable text
 *
 * Lists every call with its quality and the engine's recommendation, then
 * every non-forced card that differs from the engine's choice. Unlike key
 * moment extraction there is no cost threshold here.
 */
export function formatEngineAnalysis(result: EngineAnalysisResult): string {
  if (!result.success) {
    return 'BEN analysis unavailable';
  }

  const lines: string[] = [RULE, 'BEN ENGINE ANALYSIS', RULE];

  lines.push('', '### BIDDING ANALYSIS ###', '');
  result.bidAnalysis.forEach((entry, index) => {
    const best = entry.candidates[0];
    const recommended = best?.call ?? entry.bid;
    const explanation = (best ? best.explanation : entry.explanation) ?? '';

    lines.push(`Bid #${index + 1}: ${entry.bid}`);
    lines.push(`  Quality: ${entry.quality ?? '?'}`);
    if (recommended !== entry.bid) {
      lines.push(`  BEN recommends: ${recommended}`);
    }
    lines.push(`  Explanation: ${explanation}`);
    lines.push('');
  });

  lines.push('', '### CARD PLAY ANALYSIS ###', '');
  let mistakes = 0;
  for (const entry of result.cardAnalysis) {
    if (isForcedPlay(entry) || entry.played === entry.recommended) {
      continue;
    }
    lines.push(`MISTAKE: ${entry.played} played, BEN recommends ${entry.recommended}`);
    for (const candidate of entry.candidates.slice(0, LISTED_CANDIDATES)) {
      lines.push(`   - ${candidate.card}: ${formatImp(candidate.expectedScoreImp)} IMPs`);
    }
    lines.push('');
    mistakes++;
  }

  if (mistakes === 0) {
    lines.push('No significant mistakes found in card play');
  } else {
    lines.push('', `Total mistakes found: ${mistakes}`);
  }

  return lines.join('\n');
}
