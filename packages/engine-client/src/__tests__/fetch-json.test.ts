import { afterEach, describe, expect, it, vi } from 'vitest';

import { EngineClientError, EngineHttpError, EngineTimeoutError } from '../errors.js';
import { fetchJson } from '../fetch-json.js';

describe('fetchJson', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns parsed JSON on success', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        json: () => Promise.resolve({ success: true }),
      }),
    );

    await expect(fetchJson('http://engine.test', { method: 'POST' }, 1000)).resolves.toEqual({
      success: true,
    });
  });

  it('throws EngineHttpError with status and body on non-OK response', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue({
        ok: false,
        status: 503,
        text: () => Promise.resolve('warming up'),
      }),
    );

    const error = await fetchJson('http://engine.test', { method: 'POST' }, 1000).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(EngineHttpError);
    expect(error).toMatchObject({ status: 503, body: 'warming up', message: 'HTTP 503: warming up' });
  });

  it('wraps network errors', async () => {
    const networkError = new TypeError('fetch failed');
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(networkError));

    const error = await fetchJson('http://engine.test', { method: 'POST' }, 1000).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(EngineClientError);
    expect(error).toHaveProperty('message', 'fetch failed');
    expect(error).toHaveProperty('cause', networkError);
  });

  it('throws EngineTimeoutError when the request is aborted by the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockImplementation(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('The operation was aborted.'), { name: 'AbortError' }));
            });
          }),
      ),
    );

    const error = await fetchJson('http://engine.test/x', { method: 'POST' }, 20).catch(
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(EngineTimeoutError);
    expect(error).toHaveProperty('message', 'Request to http://engine.test/x timed out after 20ms');
  });
});
