/**
 * Global Error Handler
 *
 * Registered with `app.onError()`, so it sees every error thrown by a route
 * or middleware. Domain errors become the client-facing responses the API
 * promises; anything else is logged and reported as a 500:
 *
 * - NotFoundError   → 404, empty body
 * - ValidationError → 400, `{ field: [messages] }`
 * - HTTPException   → its own response
 * - anything else   → 500, `{ error: { code: 'INTERNAL_ERROR', message } }`
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler);
 * app.notFound(routeNotFoundHandler);
 * ```
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { isProduction } from '@/config';
import { NotFoundError, ValidationError } from '@/core/errors';
import { error, fieldErrors, internalError, notFound } from '../utils/response';

/**
 * Standard error codes used in `{ error: { code } }` responses.
 */
export const ErrorCodes = {
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export function errorHandler(err: Error, c: Context): Response {
  if (err instanceof NotFoundError) {
    return notFound(c);
  }

  if (err instanceof ValidationError) {
    return fieldErrors(c, err.fields);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  console.error('[Error Handler]', err);

  if (isProduction()) {
    return internalError(c, 'An unexpected error occurred. Please try again.');
  }

  return internalError(c, err.message, { stack: err.stack });
}

/**
 * Response for requests that match no route.
 */
export function routeNotFoundHandler(c: Context): Response {
  return error(
    c,
    ErrorCodes.NOT_FOUND,
    `Route ${c.req.method} ${c.req.path} not found`,
    404
  );
}
