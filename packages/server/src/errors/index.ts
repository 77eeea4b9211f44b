/**
 * Error module exports
 */

export { HttpError, BadRequestError, NotConfiguredError } from './http-errors.js';
export { CliError, InputError, resolveAbsolutePath } from './cli-errors.js';
export {
  type HandlerResult,
  toErrorResponse,
  errorMiddleware,
  formatError,
  handleError,
} from './handler.js';
