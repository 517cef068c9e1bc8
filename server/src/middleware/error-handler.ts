/**
 * Error Handling Middleware
 *
 * Maps SrsError codes to HTTP status codes with JSON bodies of the form
 * `{ error: { code, message } }`.
 */

import type { Context, ErrorHandler } from 'hono';
import { isSrsError, type SrsErrorCode } from '@shared/errors';
import { createLogger } from '../logger';

const log = createLogger('ErrorHandler');

export type ErrorStatus = 400 | 404 | 409 | 500 | 503;

export interface RestErrorResponse {
  error: {
    code: SrsErrorCode | 'INTERNAL_ERROR';
    message: string;
  };
}

export function mapErrorCodeToStatus(code: SrsErrorCode): ErrorStatus {
  switch (code) {
    case 'INVALID_ARGUMENT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'INVALID_STATE':
      return 409;
    case 'STORE_UNAVAILABLE':
      return 503;
  }
}

export function jsonError(
  c: Context,
  status: ErrorStatus,
  code: RestErrorResponse['error']['code'],
  message: string
) {
  const body: RestErrorResponse = { error: { code, message } };
  return c.json(body, status);
}

/**
 * Hono error handler for the REST API.
 *
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  const method = c.req.method;
  const path = c.req.path;

  if (isSrsError(err)) {
    log.warn(`${method} ${path} - ${err.code}: ${err.message}`);
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  // Stack goes to the log, never to the client
  log.error(`${method} ${path} - Unexpected error: ${err.message}`, { stack: err.stack });
  return jsonError(c, 500, 'INTERNAL_ERROR', 'An unexpected error occurred. Please try again later.');
};
