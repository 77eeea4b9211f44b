/**
 * Report generation from a board and optional engine output
 */

import type { BoardRecord, KeyMoment, TextGenerator } from '@bridge-analyst/types';

import { BRIDGE_REPORT_SYSTEM } from '../prompts/system-prompts.js';
import {
  buildEngineAssistedPrompt,
  buildReportPrompt,
  buildStandalonePrompt,
} from '../prompts/templates.js';

/**
 * Report text returned when no text generator is configured
 */
export const LLM_NOT_CONFIGURED_REPORT = 'Error: LLM API key not configured';

/**
 * Options for the report generator
 */
export interface ReportGeneratorOptions {
  /** Play cards shown in the report prompt */
  maxPlayCards?: number;
  /** Called with the error when a report could not be generated */
  onError?: (error: Error) => void;
}

/**
 * Composes prompts and returns the generator's raw text
 */
export class ReportGenerator {
  constructor(
    private readonly generator: TextGenerator,
    private readonly options: ReportGeneratorOptions = {},
  ) {}

  /**
   * Short analysis of a board, engine-assisted when engine text is given
   *
   * @throws whatever the text generator throws
   */
  async analyze(board: BoardRecord, engineText?: string): Promise<string> {
    const prompt = engineText
      ? buildEngineAssistedPrompt(board, engineText)
      : buildStandalonePrompt(board);
    const result = await this.generator.generate({ prompt });
    return result.text;
  }

  /**
   * Long post-mortem report
   *
   * Never rejects: a generation failure is returned as
   * "Error generating report: <message>".
   */
  async generateReport(
    board: BoardRecord,
    engineText?: string,
    moments?: KeyMoment[],
  ): Promise<string> {
    const prompt = buildReportPrompt(board, engineText, moments, {
      maxPlayCards: this.options.maxPlayCards,
    });

    try {
      const result = await this.generator.generate({ prompt, system: BRIDGE_REPORT_SYSTEM });
      return result.text;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.options.onError?.(err);
      return `Error generating report: ${err.message}`;
    }
  }
}
