/**
 * Shared HTTP utility: fetch + timeout + error classification
 */

import { EngineClientError, EngineHttpError, EngineTimeoutError } from './errors.js';

/**
 * Fetch JSON from a URL with a timeout
 *
 * @param url - URL to fetch
 * @param init - Fetch init options (method, headers, body)
 * @param timeoutMs - Request timeout in milliseconds
 * @returns The parsed JSON body
 * @throws EngineTimeoutError when the timeout elapses
 * @throws EngineHttpError on a non-2xx status
 * @throws EngineClientError on network or body errors
 */
export async function fetchJson(url: string, init: RequestInit, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new EngineHttpError(response.status, body);
    }

    return await response.json();
  } catch (error) {
    if (error instanceof EngineClientError) {
      throw error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      throw new EngineTimeoutError(url, timeoutMs);
    }

    throw new EngineClientError(
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined,
    );
  } finally {
    clearTimeout(timeout);
  }
}
