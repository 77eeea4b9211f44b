/**
 * Handler contract and the wrapper that turns throws into responses
 */

import { type HandlerResult, toErrorResponse } from '../errors/handler.js';
import type { Services } from '../services.js';

export type { HandlerResult };

/**
 * A route handler: request body in, status and JSON body out
 */
export type Handler = (services: Services, body: unknown) => Promise<HandlerResult>;

/**
 * Run a handler; any thrown error becomes the error envelope
 */
export async function handle(
  handler: Handler,
  services: Services,
  body: unknown,
): Promise<HandlerResult> {
  try {
    return await handler(services, body);
  } catch (error) {
    const response = toErrorResponse(error);
    if (response.status >= 500) {
      services.logger.error('Request failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return response;
  }
}

export function ok(body: Record<string, unknown>): HandlerResult {
  return { status: 200, body };
}
