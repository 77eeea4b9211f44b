/**
 * Zod schemas for engine responses
 *
 * The engine answers with loosely shaped JSON. These schemas pin down the
 * fields the service reads, fill defaults for missing ones, and convert
 * the result into the tagged records of @bridge-analyst/types.
 */

import type {
  BidAnalysisEntry,
  BidCandidate,
  CardAnalysisEntry,
  EngineAnalysisResult,
} from '@bridge-analyst/types';
import { z } from 'zod';

import { EngineResponseError } from './errors.js';

/**
 * Quality may arrive as a number or a numeric string; anything else is absent
 */
const qualitySchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value) => {
    if (typeof value === 'number') return value;
    if (typeof value === 'string') {
      const parsed = Number.parseFloat(value);
      return Number.isNaN(parsed) ? undefined : parsed;
    }
    return undefined;
  });

export const bidCandidateSchema = z
  .object({
    call: z.string(),
    explanation: z.string().nullish(),
    expected_score: z.number().nullish(),
  })
  .passthrough();

export const bidAnalysisEntrySchema = z
  .object({
    bid: z.string(),
    quality: qualitySchema,
    candidates: z.array(bidCandidateSchema).nullish(),
    explanation: z.string().nullish(),
  })
  .passthrough();

export const cardCandidateSchema = z
  .object({
    card: z.string(),
    expected_score_imp: z.number().nullish(),
  })
  .passthrough();

export const cardAnalysisEntrySchema = z
  .object({
    card: z.string().nullish(),
    who: z.string().nullish(),
    candidates: z.array(cardCandidateSchema).nullish(),
  })
  .passthrough();

export const engineResponseSchema = z
  .object({
    success: z.boolean(),
    bid_analysis: z.array(bidAnalysisEntrySchema).nullish(),
    card_analysis: z.record(z.string(), cardAnalysisEntrySchema).nullish(),
    error: z.string().nullish(),
  })
  .passthrough();

export type EngineResponse = z.infer<typeof engineResponseSchema>;

function toBidCandidate(raw: z.infer<typeof bidCandidateSchema>): BidCandidate {
  const candidate: BidCandidate = { call: raw.call };
  if (raw.explanation) candidate.explanation = raw.explanation;
  if (typeof raw.expected_score === 'number') candidate.expectedScore = raw.expected_score;
  return candidate;
}

function toBidEntry(raw: z.infer<typeof bidAnalysisEntrySchema>): BidAnalysisEntry {
  const entry: BidAnalysisEntry = {
    bid: raw.bid,
    candidates: (raw.candidates ?? []).map(toBidCandidate),
  };
  if (raw.quality !== undefined) entry.quality = raw.quality;
  if (raw.explanation) entry.explanation = raw.explanation;
  return entry;
}

function toCardEntry(
  played: string,
  raw: z.infer<typeof cardAnalysisEntrySchema>,
): CardAnalysisEntry {
  return {
    played,
    recommended: raw.card ?? played,
    who: raw.who ?? '',
    candidates: (raw.candidates ?? []).map((c) => ({
      card: c.card,
      expectedScoreImp: c.expected_score_imp ?? 0,
    })),
  };
}

/**
 * Validate an engine response body and convert it to a typed result
 *
 * @throws EngineResponseError when the body does not match the schema
 */
export function parseEngineResponse(body: unknown): EngineAnalysisResult {
  const parsed = engineResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new EngineResponseError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }

  const response = parsed.data;
  if (!response.success) {
    return {
      success: false,
      error: response.error ?? 'Engine reported an unsuccessful analysis',
      raw: body,
    };
  }

  return {
    success: true,
    bidAnalysis: (response.bid_analysis ?? []).map(toBidEntry),
    cardAnalysis: Object.entries(response.card_analysis ?? {}).map(([played, entry]) =>
      toCardEntry(played, entry),
    ),
    raw: body,
  };
}
