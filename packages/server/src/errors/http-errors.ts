/**
 * HTTP error classes
 *
 * Thrown by handlers and turned into `{ success: false, error }` responses.
 */

/**
 * Base HTTP error carrying a status code
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'HttpError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

/**
 * Malformed request input (400)
 */
export class BadRequestError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'BadRequestError';
  }
}

/**
 * A collaborator the request needs is not configured (500)
 */
export class NotConfiguredError extends HttpError {
  constructor(public readonly variable: string) {
    super(500, `${variable} not configured`);
    this.name = 'NotConfiguredError';
  }
}
