/**
 * Error classes for analysis engine requests
 */

/**
 * Base error class for engine client errors
 */
export class EngineClientError extends Error {
  constructor(
    message: string,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'EngineClientError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineClientError);
    }
  }
}

/**
 * Error thrown when the engine answers with a non-2xx status
 */
export class EngineHttpError extends EngineClientError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`HTTP ${status}${body ? `: ${body}` : ''}`);
    this.name = 'EngineHttpError';
  }
}

/**
 * Error thrown when an engine request exceeds its timeout
 */
export class EngineTimeoutError extends EngineClientError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Error thrown when the engine response does not have the expected shape
 */
export class EngineResponseError extends EngineClientError {
  constructor(public readonly issues: Array<{ path: string; message: string }>) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
    super(`Malformed engine response: ${detail}`);
    this.name = 'EngineResponseError';
  }
}
