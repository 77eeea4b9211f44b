import { describe, expect, it } from 'vitest';

import { EngineResponseError } from '../errors.js';
import { parseEngineResponse } from '../schemas.js';

describe('parseEngineResponse', () => {
  it('converts bid and card analysis into typed records', () => {
    const body = {
      success: true,
      bid_analysis: [
        {
          bid: '1N',
          quality: 0.92,
          candidates: [{ call: '1N', explanation: 'balanced 15-17', insta_score: 0.9 }],
        },
      ],
      card_analysis: {
        C2: {
          card: 'CA',
          who: 'NN-value',
          candidates: [
            { card: 'CA', expected_score_imp: 1.2 },
            { card: 'C2', expected_score_imp: 0.1 },
          ],
        },
      },
    };

    expect(parseEngineResponse(body)).toEqual({
      success: true,
      bidAnalysis: [
        {
          bid: '1N',
          quality: 0.92,
          candidates: [{ call: '1N', explanation: 'balanced 15-17' }],
        },
      ],
      cardAnalysis: [
        {
          played: 'C2',
          recommended: 'CA',
          who: 'NN-value',
          candidates: [
            { card: 'CA', expectedScoreImp: 1.2 },
            { card: 'C2', expectedScoreImp: 0.1 },
          ],
        },
      ],
      raw: body,
    });
  });

  it('fills defaults for missing fields', () => {
    const result = parseEngineResponse({
      success: true,
      bid_analysis: [{ bid: 'PASS' }],
      card_analysis: { SA: {} },
    });

    expect(result).toMatchObject({
      success: true,
      bidAnalysis: [{ bid: 'PASS', candidates: [] }],
      cardAnalysis: [{ played: 'SA', recommended: 'SA', who: '', candidates: [] }],
    });
  });

  it('reads a numeric string quality and drops a non-numeric one', () => {
    const result = parseEngineResponse({
      success: true,
      bid_analysis: [
        { bid: '1C', quality: '0.75' },
        { bid: '1D', quality: 'good' },
      ],
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.bidAnalysis[0]?.quality).toBe(0.75);
      expect(result.bidAnalysis[1]?.quality).toBeUndefined();
    }
  });

  it('keeps card entries in recorded order', () => {
    const result = parseEngineResponse({
      success: true,
      card_analysis: { HK: {}, D4: {}, S9: {} },
    });

    expect(result.success && result.cardAnalysis.map((c) => c.played)).toEqual(['HK', 'D4', 'S9']);
  });

  it('returns the engine error for an unsuccessful response', () => {
    expect(parseEngineResponse({ success: false, error: 'bad deal' })).toEqual({
      success: false,
      error: 'bad deal',
      raw: { success: false, error: 'bad deal' },
    });
  });

  it('throws EngineResponseError for a malformed body', () => {
    expect(() => parseEngineResponse({ bid_analysis: 'nope' })).toThrow(EngineResponseError);
    expect(() => parseEngineResponse('<html>')).toThrow(/^Malformed engine response/);
  });
});
