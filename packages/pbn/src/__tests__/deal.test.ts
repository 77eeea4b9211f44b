import { describe, it, expect } from 'vitest';

import { parseDeal, nextSeat } from '../index.js';

describe('Deal parser', () => {
  it('places per-seat hands directly', () => {
    const { hands, warnings } = parseDeal('N:AKQ.J.T9.8 E:2.3.4.5 S:6.7.8.9 W:T.J.Q.K');
    expect(hands).toEqual(['AKQ.J.T9.8', '2.3.4.5', '6.7.8.9', 'T.J.Q.K']);
    expect(warnings).toEqual([]);
  });

  it('accepts per-seat hands in any order', () => {
    const { hands } = parseDeal('W:T.J.Q.K N:AKQ.J.T9.8');
    expect(hands).toEqual(['AKQ.J.T9.8', '', '', 'T.J.Q.K']);
  });

  it('rotates clockwise from the leading seat', () => {
    const { hands } = parseDeal(
      'S:QT4.A.KJ94.KQ986 5.KT73.AQ82.T532 AJ87632.J96.753. K9.Q8542.T6.AJ74',
    );
    expect(hands[2]).toBe('QT4.A.KJ94.KQ986');
    expect(hands[3]).toBe('5.KT73.AQ82.T532');
    expect(hands[0]).toBe('AJ87632.J96.753.');
    expect(hands[1]).toBe('K9.Q8542.T6.AJ74');
  });

  it('accepts a lowercase seat marker', () => {
    const { hands } = parseDeal('e:2.3.4.5 6.7.8.9');
    expect(hands).toEqual(['', '2.3.4.5', '6.7.8.9', '']);
  });

  it('assumes North when the seat marker is missing', () => {
    const { hands, warnings } = parseDeal('AKQ.J.T9.8 2.3.4.5', 4);
    expect(hands).toEqual(['AKQ.J.T9.8', '2.3.4.5', '', '']);
    expect(warnings).toEqual([{ line: 4, message: 'Deal has no seat marker, assuming North first' }]);
  });

  it('keeps only four hands', () => {
    const { hands, warnings } = parseDeal('N:a b c d e');
    expect(hands).toEqual(['a', 'b', 'c', 'd']);
    expect(warnings).toHaveLength(1);
  });

  it('stores hand strings without validating them', () => {
    const { hands } = parseDeal('N:- - - -');
    expect(hands).toEqual(['-', '-', '-', '-']);
  });

  it('returns empty hands for an empty value', () => {
    expect(parseDeal('').hands).toEqual(['', '', '', '']);
    expect(parseDeal('').warnings).toEqual([]);
  });

  describe('nextSeat', () => {
    it('goes clockwise and wraps', () => {
      expect(nextSeat('N')).toBe('E');
      expect(nextSeat('E')).toBe('S');
      expect(nextSeat('S')).toBe('W');
      expect(nextSeat('W')).toBe('N');
    });
  });
});
