/**
 * Tests for configuration loading
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { formatConfig, loadConfig, loadEnvConfig } from '../config/loader.js';
import { ConfigValidationError, validateConfig } from '../config/validation.js';

describe('loadEnvConfig', () => {
  it('returns an empty config for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  it('maps variables to config sections', () => {
    expect(
      loadEnvConfig({
        PORT: '8080',
        HOST: '127.0.0.1',
        BEN_API_URL: 'http://ben.test',
        ENGINE_TIMEOUT_MS: '5000',
        GEMINI_API_KEY: 'test-secret',
        LLM_MODEL: 'test-model',
        LOG_LEVEL: 'DEBUG',
      }),
    ).toEqual({
      server: { host: '127.0.0.1', port: 8080 },
      engine: { baseUrl: 'http://ben.test', timeoutMs: 5000 },
      llm: { apiKey: 'test-secret', model: 'test-model' },
      logging: { level: 'debug' },
    });
  });

  it('prefers LLM_API_KEY over GEMINI_API_KEY', () => {
    const config = loadEnvConfig({ GEMINI_API_KEY: 'gemini-secret', LLM_API_KEY: 'test-secret' });
    expect(config.llm?.apiKey).toBe('test-secret');
  });

  it('treats empty values as unset', () => {
    expect(loadEnvConfig({ BEN_API_URL: '', GEMINI_API_KEY: '' })).toEqual({});
  });

  it('rejects an unknown log level', () => {
    expect(() => loadEnvConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigValidationError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bridge-analyst-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, '.bridgeanalystrc.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it('returns the defaults when nothing is set', async () => {
    await expect(loadConfig({}, {})).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('applies file, environment and CLI in order of precedence', async () => {
    const file = writeConfig({
      server: { port: 7000, host: '10.0.0.1' },
      engine: { baseUrl: 'http://file.test' },
      report: { maxPlayCards: 12 },
    });

    const config = await loadConfig(
      { config: file, port: 9000 },
      { BEN_API_URL: 'http://env.test', PORT: '8000' },
    );

    expect(config.server).toEqual({ host: '10.0.0.1', port: 9000 });
    expect(config.engine.baseUrl).toBe('http://env.test');
    expect(config.report.maxPlayCards).toBe(12);
  });

  it('maps --no-color and --log-level', async () => {
    const config = await loadConfig({ noColor: true, logLevel: 'warn' }, {});
    expect(config.logging).toEqual({ level: 'warn', color: false });
  });

  it('rejects a non-numeric port from the environment', async () => {
    await expect(loadConfig({}, { PORT: 'eighty' })).rejects.toThrow(ConfigValidationError);
  });

  it('rejects an invalid config file', async () => {
    const file = writeConfig({ engine: { baseUrl: 'not a url' } });
    await expect(loadConfig({ config: file }, {})).rejects.toThrow(ConfigValidationError);
  });
});

describe('validateConfig', () => {
  it('reports the path of each problem', () => {
    try {
      validateConfig({ ...DEFAULT_CONFIG, server: { host: '0.0.0.0', port: 70000 } });
      expect.unreachable('validation should fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual(['server.port']);
      }
    }
  });
});

describe('formatConfig', () => {
  it('masks the API key', () => {
    const text = formatConfig({ ...DEFAULT_CONFIG, llm: { ...DEFAULT_CONFIG.llm, apiKey: 'test-secret' } });
    expect(text).toContain('"apiKey": "********"');
    expect(text).not.toContain('test-secret');
  });
});
