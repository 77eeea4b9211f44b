/**
 * Board-record endpoints: full pipeline, LLM only, engine only, combined, compare
 */

import { extractKeyMoments } from '@bridge-analyst/core';
import { formatEngineAnalysis } from '@bridge-analyst/engine-client';
import type { ReportGenerator } from '@bridge-analyst/llm';
import type { BoardRecord, EngineAnalysisResult } from '@bridge-analyst/types';

import { parseBoardBody } from '../board-schema.js';
import { NotConfiguredError } from '../errors/http-errors.js';
import type { Logger } from '../logger.js';
import { analyzeBoard } from '../pipeline.js';
import { toWireMoments } from '../serialize.js';

import { type Handler, ok } from './handle.js';

const LLM_KEY_VARIABLE = 'GEMINI_API_KEY';
const ENGINE_URL_VARIABLE = 'BEN_API_URL';

/**
 * The engine's response as received, or the failure itself when there was none
 */
export function rawEngineBody(result: EngineAnalysisResult): unknown {
  if (result.success) {
    return result.raw;
  }
  return result.raw ?? { success: false, error: result.error };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the LLM analysis; a generation failure becomes an inline error string
 */
async function analyzeInline(
  { reporter, logger }: { reporter: ReportGenerator; logger: Logger },
  board: BoardRecord,
  engineText?: string,
): Promise<string> {
  try {
    return await reporter.analyze(board, engineText);
  } catch (error) {
    logger.warn('LLM analysis failed', { error: errorMessage(error) });
    return `Error generating analysis: ${errorMessage(error)}`;
  }
}

export const manualAnalyzeHandler: Handler = async (services, body) => {
  const board = parseBoardBody(body);
  const result = await analyzeBoard(services, board, {
    timeoutMs: services.config.engine.reportTimeoutMs,
  });

  return ok({
    success: true,
    board,
    key_moments: toWireMoments(result.moments),
    report: result.report,
    ben_available: result.engineResult?.success === true,
    total_mistakes: result.summary.totalMistakes,
    total_imp_cost: result.summary.totalImpCost,
  });
};

export const geminiAnalyzeHandler: Handler = async ({ reporter, logger }, body) => {
  const board = parseBoardBody(body);
  if (!reporter) {
    throw new NotConfiguredError(LLM_KEY_VARIABLE);
  }

  const analysis = await analyzeInline({ reporter, logger }, board);
  return ok({ success: true, source: 'gemini', analysis });
};

export const benAnalyzeHandler: Handler = async ({ engine, logger }, body) => {
  const board = parseBoardBody(body);
  if (!engine) {
    throw new NotConfiguredError(ENGINE_URL_VARIABLE);
  }

  const result = await engine.analyze(board);
  if (!result.success) {
    logger.warn('Engine analysis failed', { error: result.error });
  }

  return ok({
    success: result.success,
    source: 'ben',
    raw: rawEngineBody(result),
    formatted: formatEngineAnalysis(result),
    key_moments: toWireMoments(extractKeyMoments(result)),
  });
};

export const combinedAnalyzeHandler: Handler = async ({ engine, reporter, logger }, body) => {
  const board = parseBoardBody(body);
  if (!reporter) {
    throw new NotConfiguredError(LLM_KEY_VARIABLE);
  }
  if (!engine) {
    throw new NotConfiguredError(ENGINE_URL_VARIABLE);
  }

  const result = await engine.analyze(board);
  if (!result.success) {
    logger.warn('Engine analysis failed', { error: result.error });
  }
  const formatted = formatEngineAnalysis(result);
  const analysis = await analyzeInline({ reporter, logger }, board, formatted);

  return ok({
    success: true,
    source: 'gemini+ben',
    ben_raw: rawEngineBody(result),
    ben_formatted: formatted,
    gemini_analysis: analysis,
    key_moments: toWireMoments(extractKeyMoments(result)),
  });
};

export const compareAnalyzeHandler: Handler = async ({ engine, reporter, logger }, body) => {
  const board = parseBoardBody(body);
  const comparisons: Record<string, Record<string, unknown>> = {};

  if (reporter) {
    try {
      comparisons['gemini_only'] = { status: 'success', analysis: await reporter.analyze(board) };
    } catch (error) {
      logger.warn('LLM analysis failed', { error: errorMessage(error) });
      comparisons['gemini_only'] = { status: 'error', error: errorMessage(error) };
    }
  } else {
    comparisons['gemini_only'] = { status: 'not_configured', error: `${LLM_KEY_VARIABLE} not set` };
  }

  let engineResult: EngineAnalysisResult | undefined;
  let formatted: string | undefined;
  if (engine) {
    engineResult = await engine.analyze(board);
    formatted = formatEngineAnalysis(engineResult);
    if (!engineResult.success) {
      logger.warn('Engine analysis failed', { error: engineResult.error });
    }
    comparisons['ben_only'] = {
      status: engineResult.success ? 'success' : 'error',
      raw: rawEngineBody(engineResult),
      formatted,
    };
  } else {
    comparisons['ben_only'] = { status: 'not_configured', error: `${ENGINE_URL_VARIABLE} not set` };
  }

  if (reporter && engineResult?.success && formatted !== undefined) {
    try {
      comparisons['gemini_with_ben'] = {
        status: 'success',
        analysis: await reporter.analyze(board, formatted),
      };
    } catch (error) {
      logger.warn('LLM analysis failed', { error: errorMessage(error) });
      comparisons['gemini_with_ben'] = { status: 'error', error: errorMessage(error) };
    }
  } else {
    comparisons['gemini_with_ben'] = {
      status: 'not_available',
      error: 'Requires both Gemini and BEN to be configured and working',
    };
  }

  return ok({ success: true, board, comparisons });
};
