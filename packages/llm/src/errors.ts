/**
 * Error classes for LLM operations
 */

/**
 * Error codes for LLM operations
 */
export enum LLMErrorCode {
  /** API rate limit exceeded */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Invalid response from LLM */
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  /** General API error */
  API_ERROR = 'API_ERROR',
  /** Request timed out */
  TIMEOUT = 'TIMEOUT',
}

/**
 * Base error class for LLM operations
 */
export class LLMError extends Error {
  constructor(
    message: string,
    public readonly code: LLMErrorCode,
    public override readonly cause?: Error,
  ) {
    super(message);
    this.name = 'LLMError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LLMError);
    }
  }
}

/**
 * Error thrown when API rate limit is exceeded
 */
export class RateLimitError extends LLMError {
  constructor(
    public readonly retryAfterMs: number,
    cause?: Error,
  ) {
    super(`Rate limited, retry after ${retryAfterMs}ms`, LLMErrorCode.RATE_LIMITED, cause);
    this.name = 'RateLimitError';
  }
}

/**
 * Error thrown when API request times out
 */
export class TimeoutError extends LLMError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
    cause?: Error,
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`, LLMErrorCode.TIMEOUT, cause);
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown for general API errors
 */
export class APIError extends LLMError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, LLMErrorCode.API_ERROR, cause);
    this.name = 'APIError';
  }
}
