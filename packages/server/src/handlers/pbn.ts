/**
 * PBN endpoints: parse, full analysis, quick analysis
 */

import { hasHands, parsePbn, type PbnParseResult } from '@bridge-analyst/pbn';

import { BadRequestError, NotConfiguredError } from '../errors/http-errors.js';
import { analyzeBoard } from '../pipeline.js';
import { toWireMoments } from '../serialize.js';

import { type Handler, ok } from './handle.js';

/**
 * PBN text from a raw text body or a `{ pbn }` JSON body
 */
export function extractPbnText(body: unknown): string {
  if (typeof body === 'string') {
    return body;
  }
  if (typeof body === 'object' && body !== null && 'pbn' in body && typeof body.pbn === 'string') {
    return body.pbn;
  }
  return '';
}

/**
 * Parse the body, rejecting empty input and boards without hands
 * @throws BadRequestError
 */
function parseBody(body: unknown): PbnParseResult {
  const text = extractPbnText(body);
  if (text.trim() === '') {
    throw new BadRequestError('No PBN content provided');
  }

  const parsed = parsePbn(text);
  if (!hasHands(parsed.board)) {
    throw new BadRequestError('Could not parse hands from PBN', parsed.warnings);
  }
  return parsed;
}

export const parsePbnHandler: Handler = async (_services, body) => {
  const { board, warnings } = parseBody(body);
  return ok({ success: true, board, warnings });
};

export const analyzePbnHandler: Handler = async (services, body) => {
  const { board, warnings } = parseBody(body);
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
    warnings,
  });
};

export const quickAnalyzeHandler: Handler = async (services, body) => {
  if (!services.engine) {
    throw new NotConfiguredError('BEN_API_URL');
  }

  const { board, warnings } = parseBody(body);
  const result = await analyzeBoard(services, board, { report: false });

  if (result.engineResult && !result.engineResult.success) {
    return ok({ success: false, board, error: result.engineResult.error, warnings });
  }

  return ok({
    success: true,
    board,
    key_moments: toWireMoments(result.moments),
    total_mistakes: result.summary.totalMistakes,
    total_imp_cost: result.summary.totalImpCost,
    warnings,
  });
};
