/**
 * Analyze command implementation
 */

import { hasHands, parsePbn } from '@bridge-analyst/pbn';
import type { KeyMoment, KeyMomentSummary } from '@bridge-analyst/types';
import chalk from 'chalk';
import ora from 'ora';

import type { CommandOptions } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import { InputError } from '../errors/cli-errors.js';
import { Logger } from '../logger.js';
import { analyzeBoard, type PipelinePhase } from '../pipeline.js';
import { createServices } from '../services.js';

import { readPbnFile } from './input.js';

const PHASE_TEXT: Record<PipelinePhase, string> = {
  engine: 'Waiting for engine analysis...',
  report: 'Generating report...',
};

type ColorFn = (text: string) => string;

interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
}

function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text) => chalk.bold(text),
      dim: (text) => chalk.dim(text),
      red: (text) => chalk.red(text),
      yellow: (text) => chalk.yellow(text),
    };
  }
  const identity = (text: string): string => text;
  return { bold: identity, dim: identity, red: identity, yellow: identity };
}

/**
 * One line per key moment, headed by the summary
 */
export function formatMoments(
  moments: KeyMoment[],
  summary: KeyMomentSummary,
  useColor = false,
): string {
  const c = createColorFns(useColor);
  const lines = [
    c.bold(`Key moments: ${summary.totalMistakes} (${summary.totalImpCost.toFixed(2)} IMPs)`),
  ];

  for (const moment of moments) {
    const tag = moment.severity === 'major' ? c.red('[major]') : c.yellow('[minor]');
    if (moment.kind === 'bidding') {
      lines.push(`  ${tag} Bid #${moment.position}: ${moment.actual}, recommended ${moment.recommended}`);
    } else {
      lines.push(
        `  ${tag} Trick ${moment.trick ?? '?'}, card ${moment.position}: ${moment.actual}, recommended ${moment.recommended} ${c.dim(`(${moment.cost.toFixed(2)} IMPs)`)}`,
      );
    }
  }

  return lines.join('\n');
}

export async function analyzeCommand(file: string, options: CommandOptions): Promise<void> {
  const useColor = !options.noColor;
  const c = createColorFns(useColor);

  const config = await loadConfig(options);
  if (options.showConfig) {
    console.log(formatConfig(config));
    return;
  }

  const { board, warnings } = parsePbn(readPbnFile(file));
  for (const warning of warnings) {
    console.error(c.yellow(`warning (line ${warning.line}): ${warning.message}`));
  }
  if (!hasHands(board)) {
    throw new InputError('Could not parse hands from PBN', 'Check the [Deal] tag of the file');
  }

  const logger = new Logger({ level: config.logging.level, color: useColor });
  const services = createServices(config, logger);
  if (!services.engine) {
    logger.warn('BEN_API_URL not configured; skipping engine analysis');
  }

  const spinner = ora({ color: 'cyan', isEnabled: useColor && process.stderr.isTTY === true });
  const result = await analyzeBoard(services, board, {
    report: options.report,
    timeoutMs: config.engine.reportTimeoutMs,
    onPhase: (phase) => {
      spinner.start(PHASE_TEXT[phase]);
    },
  });

  if (result.engineResult && !result.engineResult.success) {
    spinner.fail(c.red(`Engine analysis failed: ${result.engineResult.error}`));
  } else {
    spinner.stop();
  }

  console.log(formatMoments(result.moments, result.summary, useColor));
  if (result.report !== undefined) {
    console.log('');
    console.log(result.report);
  }
}
