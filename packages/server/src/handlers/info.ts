/**
 * Service information and health
 */

import { KEY_MOMENT_THRESHOLDS } from '@bridge-analyst/core';

import { VERSION } from '../version.js';

import { type Handler, ok } from './handle.js';

export const SERVICE_NAME = 'Bridge Analyst API';

/**
 * Endpoint list shown on the index page
 */
export const ENDPOINTS: Record<string, string> = {
  'GET /': 'This info page',
  'GET /health': 'Health check',
  'GET /api/info': 'Service version, input formats and thresholds',
  'POST /api/parse/pbn': 'Parse PBN into a board record',
  'POST /api/analyze/pbn': 'Full analysis of a PBN board (engine, key moments, report)',
  'POST /api/analyze/quick': 'Engine analysis and key moments of a PBN board',
  'POST /api/analyze/manual': 'Full analysis of a board record',
  'POST /api/analyze/gemini': 'LLM-only analysis',
  'POST /api/analyze/ben': 'Engine-only analysis',
  'POST /api/analyze/combined': 'LLM analysis enhanced with engine output',
  'POST /api/analyze/compare': 'Compare LLM alone, engine alone and both',
};

export const home: Handler = async ({ engine, reporter }) =>
  ok({
    service: SERVICE_NAME,
    status: 'running',
    endpoints: ENDPOINTS,
    configuration: {
      ben_configured: engine !== undefined,
      gemini_configured: reporter !== undefined,
    },
  });

export const health: Handler = async ({ engine, reporter }) =>
  ok({
    status: 'ok',
    ben_url: engine !== undefined,
    gemini_key: reporter !== undefined,
  });

export const apiInfo: Handler = async () =>
  ok({
    name: 'bridge-analyst',
    version: VERSION,
    input_formats: ['pbn', 'board-json'],
    thresholds: {
      min_card_cost: KEY_MOMENT_THRESHOLDS.minCardCost,
      major_card_cost: KEY_MOMENT_THRESHOLDS.majorCardCost,
      major_bid_quality: KEY_MOMENT_THRESHOLDS.majorBidQuality,
      max_alternatives: KEY_MOMENT_THRESHOLDS.maxAlternatives,
    },
  });
