/**
 * The board analysis pipeline: engine, key moments, report
 */

import { extractKeyMoments, summarizeMoments } from '@bridge-analyst/core';
import { formatEngineAnalysis } from '@bridge-analyst/engine-client';
import { LLM_NOT_CONFIGURED_REPORT } from '@bridge-analyst/llm';
import type {
  BoardRecord,
  EngineAnalysisResult,
  KeyMoment,
  KeyMomentSummary,
} from '@bridge-analyst/types';

import type { Services } from './services.js';

export type PipelinePhase = 'engine' | 'report';

export interface PipelineOptions {
  /** Generate the report (default: true) */
  report?: boolean;
  /** Engine timeout for this run */
  timeoutMs?: number;
  /** Called when a phase starts */
  onPhase?: (phase: PipelinePhase) => void;
}

export interface PipelineResult {
  /** Absent when no engine is configured */
  engineResult?: EngineAnalysisResult;
  moments: KeyMoment[];
  summary: KeyMomentSummary;
  /** Formatted engine output, when the engine succeeded */
  engineText?: string;
  /** Report text, when requested */
  report?: string;
}

/**
 * Run a board through the configured collaborators
 *
 * Never rejects on collaborator failure: an engine failure leaves the
 * moments empty and a report failure becomes an inline error string.
 */
export async function analyzeBoard(
  services: Services,
  board: BoardRecord,
  options: PipelineOptions = {},
): Promise<PipelineResult> {
  const { engine, reporter, logger } = services;
  const result: PipelineResult = {
    moments: [],
    summary: { totalMistakes: 0, totalImpCost: 0 },
  };

  if (engine) {
    options.onPhase?.('engine');
    const engineResult = await engine.analyze(
      board,
      options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs },
    );
    result.engineResult = engineResult;

    if (engineResult.success) {
      result.moments = extractKeyMoments(engineResult);
      result.summary = summarizeMoments(result.moments);
      result.engineText = formatEngineAnalysis(engineResult);
    } else {
      logger.warn('Engine analysis failed', { error: engineResult.error });
    }
  }

  if (options.report !== false) {
    options.onPhase?.('report');
    result.report = reporter
      ? await reporter.generateReport(board, result.engineText, result.moments)
      : LLM_NOT_CONFIGURED_REPORT;
  }

  return result;
}
