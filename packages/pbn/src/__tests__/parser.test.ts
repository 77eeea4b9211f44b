import { describe, it, expect } from 'vitest';

import { parsePbn, parseVulnerability, hasHands } from '../index.js';

const SAMPLE = `
[Event "Club Pairs"]
[Site "Community Hall"]
[Date "2025.03.14"]
[Board "7"]
[North "Ann"]
[East "Bo"]
[South "Cy"]
[West "Di"]
[Dealer "s"]
[Vulnerable "NS"]
[Deal "S:QT4.A.KJ94.KQ986 5.KT73.AQ82.T532 AJ87632.J96.753. K9.Q8542.T6.AJ74"]
[Contract "4S"]
[Declarer "n"]
[Result "10"]
[Auction "S"]
1NT Pass 4H Pass
4S Pass Pass Pass
[Play "E"]
c2 D3 CA C6
D6 DJ DQ D5
`;

describe('PBN Parser', () => {
  describe('tag parsing', () => {
    it('copies metadata tags', () => {
      const { board } = parsePbn(SAMPLE);

      expect(board.event).toBe('Club Pairs');
      expect(board.site).toBe('Community Hall');
      expect(board.date).toBe('2025.03.14');
      expect(board.board).toBe('7');
      expect(board.north).toBe('Ann');
      expect(board.east).toBe('Bo');
      expect(board.south).toBe('Cy');
      expect(board.west).toBe('Di');
      expect(board.contract).toBe('4S');
    });

    it('uppercases dealer and declarer', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.dealer).toBe('S');
      expect(board.declarer).toBe('N');
    });

    it('converts the result to a number', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.result).toBe(10);
    });

    it('warns about a non-numeric result and leaves it unset', () => {
      const { board, warnings } = parsePbn('[Result "ten"]');
      expect(board.result).toBeUndefined();
      expect(warnings).toEqual([{ line: 1, message: 'Non-numeric result "ten"' }]);
    });

    it('keeps the default dealer for an unknown seat', () => {
      const { board, warnings } = parsePbn('[Dealer "Q"]');
      expect(board.dealer).toBe('N');
      expect(warnings).toEqual([{ line: 1, message: 'Unknown dealer "Q"' }]);
    });

    it('records the auction and play tag values', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.auctionStart).toBe('S');
      expect(board.playStart).toBe('E');
    });

    it('ignores tag-like lines with escaped quotes', () => {
      const { board } = parsePbn('[Event "A \\"quoted\\" name"]');
      expect(board.event).toBeUndefined();
    });

    it('tolerates surrounding whitespace and blank lines', () => {
      const { board } = parsePbn('   \n   [Dealer "W"]   \n\t\n');
      expect(board.dealer).toBe('W');
    });
  });

  describe('vulnerability', () => {
    it.each([
      ['All', [true, true]],
      ['both', [true, true]],
      ['NS', [true, false]],
      ['ew', [false, true]],
      ['None', [false, false]],
      ['Love', [false, false]],
      ['-', [false, false]],
      ['sideways', [false, false]],
    ])('maps %s', (value, expected) => {
      expect(parseVulnerability(value)).toEqual(expected);
    });

    it('defaults to neither side when the tag is absent', () => {
      expect(parsePbn('[Dealer "N"]').board.vuln).toEqual([false, false]);
    });

    it('reads the tag from PBN', () => {
      expect(parsePbn(SAMPLE).board.vuln).toEqual([true, false]);
    });
  });

  describe('deal', () => {
    it('assigns rotated hands starting from the marked seat', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.hands).toEqual([
        'AJ87632.J96.753.',
        'K9.Q8542.T6.AJ74',
        'QT4.A.KJ94.KQ986',
        '5.KT73.AQ82.T532',
      ]);
      expect(hasHands(board)).toBe(true);
    });

    it('returns empty hands when there is no Deal tag', () => {
      const { board } = parsePbn('[Dealer "E"]\n[Auction "E"]\nPass');
      expect(board.hands).toEqual(['', '', '', '']);
      expect(hasHands(board)).toBe(false);
    });
  });

  describe('auction', () => {
    it('normalizes calls and notrump strains', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.auction).toEqual(['1N', 'PASS', '4H', 'PASS', '4S', 'PASS', 'PASS', 'PASS']);
    });

    it('normalizes pass, double and redouble spellings', () => {
      const { board } = parsePbn('[Auction "N"]\nP Pass DBL double rdbl');
      expect(board.auction).toEqual(['PASS', 'PASS', 'X', 'X', 'XX']);
    });

    it('drops malformed tokens and reports them', () => {
      const { board, warnings } = parsePbn('[Auction "N"]\n1C 9Z 2D');
      expect(board.auction).toEqual(['1C', '2D']);
      expect(warnings).toEqual([{ line: 2, message: 'Dropped auction token "9Z"' }]);
    });

    it('ignores call-like lines before the Auction tag', () => {
      const { board } = parsePbn('1C Pass\n[Auction "N"]\n2C');
      expect(board.auction).toEqual(['2C']);
    });

    it('ends the auction section at the next tag', () => {
      const { board } = parsePbn('[Auction "N"]\n1C\n[Note "1:strong"]\n2C');
      expect(board.auction).toEqual(['1C']);
    });
  });

  describe('play', () => {
    it('reads and uppercases cards after the Play tag', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.play).toEqual(['C2', 'D3', 'CA', 'C6', 'D6', 'DJ', 'DQ', 'D5']);
    });

    it('drops malformed cards and reports them', () => {
      const { board, warnings } = parsePbn('[Play "W"]\nSA S10 ZZ -\nHK');
      expect(board.play).toEqual(['SA', 'HK']);
      expect(warnings.map((w) => w.message)).toEqual([
        'Dropped play token "S10"',
        'Dropped play token "ZZ"',
        'Dropped play token "-"',
      ]);
    });

    it('does not read play cards into the auction', () => {
      const { board } = parsePbn(SAMPLE);
      expect(board.auction).toHaveLength(8);
    });
  });

  it('never throws on arbitrary input', () => {
    const { board } = parsePbn('}{ not pbn at all ]["');
    expect(board.dealer).toBe('N');
    expect(board.auction).toEqual([]);
    expect(board.play).toEqual([]);
  });
});
