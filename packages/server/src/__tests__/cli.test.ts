/**
 * Tests for the CLI program and its commands
 */

import { board, createMockEngine, getFixturePath } from '@bridge-analyst/test-utils';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { createProgram, parseCliOptions } from '../cli.js';
import { analyzeCommand, formatMoments } from '../commands/analyze.js';
import { parseCommand } from '../commands/parse.js';
import { serveCommand } from '../commands/serve.js';
import { InputError } from '../errors/cli-errors.js';
import { analyzeBoard } from '../pipeline.js';

import { createTestServices, sampleEngineResult } from './helpers/services.js';

describe('parseCliOptions', () => {
  it('maps Commander options', () => {
    expect(parseCliOptions({ port: 8080, color: false, logLevel: 'debug' })).toEqual({
      config: undefined,
      host: undefined,
      port: 8080,
      engineUrl: undefined,
      logLevel: 'debug',
      noColor: true,
      report: true,
      showConfig: false,
    });
  });

  it('maps --show-config', () => {
    expect(parseCliOptions({ showConfig: true }).showConfig).toBe(true);
  });

  it('maps --no-report', () => {
    expect(parseCliOptions({ report: false }).report).toBe(false);
  });

  it('rejects an unknown log level', () => {
    expect(() => parseCliOptions({ logLevel: 'loud' })).toThrow();
  });
});

describe('createProgram', () => {
  it('defines the serve, parse and analyze commands', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(['serve', 'parse', 'analyze']);
  });
});

describe('parseCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the board and warnings as JSON', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await parseCommand(getFixturePath('boards/direct.pbn'));

    const output = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(output.board.dealer).toBe('E');
    expect(output.board.vuln).toEqual([true, false]);
    expect(output.warnings).toEqual([]);
  });

  it('rejects a missing file', async () => {
    await expect(parseCommand('/nonexistent/board.pbn')).rejects.toThrow(InputError);
  });
});

describe('--show-config', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the resolved serve configuration without starting the server', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await serveCommand({ port: 6123, engineUrl: 'http://engine.test', showConfig: true });

    expect(log).toHaveBeenCalledTimes(1);
    const printed = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed.server.port).toBe(6123);
    expect(printed.engine.baseUrl).toBe('http://engine.test');
  });

  it('prints the configuration before the analyze input is read', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await analyzeCommand('/nonexistent/board.pbn', {
      engineUrl: 'http://engine.test',
      report: false,
      showConfig: true,
    });

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0])).engine.baseUrl).toBe('http://engine.test');
  });
});

describe('formatMoments', () => {
  it('lists each moment under the summary', async () => {
    const engine = createMockEngine({ result: sampleEngineResult() });
    const result = await analyzeBoard(createTestServices({ engine }), board().build(), {
      report: false,
    });

    expect(formatMoments(result.moments, result.summary).split('\n')).toEqual([
      'Key moments: 2 (2.50 IMPs)',
      '  [major] Trick 1, card 3: H6, recommended H9 (2.50 IMPs)',
      '  [major] Bid #3: 1S, recommended 2S',
    ]);
  });

  it('prints only the summary without moments', () => {
    expect(formatMoments([], { totalMistakes: 0, totalImpCost: 0 })).toBe(
      'Key moments: 0 (0.00 IMPs)',
    );
  });
});
