/**
 * API Response Utilities
 *
 * Helpers that give every endpoint the same response shapes:
 *
 * - success()     → bare JSON payload (200 or 201)
 * - noContent()   → 204, empty body
 * - notFound()    → 404, empty body
 * - fieldErrors() → 400, `{ field: [messages] }`
 * - error()       → `{ error: { code, message, details? } }` for everything else
 *
 * @example
 * ```typescript
 * router.get('/:id/', async (c) => {
 *   const resource = await repo.findById(id);
 *   if (!resource) {
 *     return notFound(c);
 *   }
 *   return success(c, serializeResource(resource, baseUrl));
 * });
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { isProduction } from '@/config';
import type { FieldErrors } from '@/core/errors';
import type { ApiErrorResponse } from '../types';

/**
 * Returns `data` as the JSON response body.
 */
export function success<T>(c: Context, data: T, statusCode: ContentfulStatusCode = 200): Response {
  return c.json(data, statusCode);
}

/**
 * 204 No Content, used after deletes.
 */
export function noContent(c: Context): Response {
  return c.body(null, 204);
}

/**
 * 404 with an empty body, for ids that do not resolve to a record.
 */
export function notFound(c: Context): Response {
  return c.body(null, 404);
}

/**
 * 400 with a field → messages map.
 */
export function fieldErrors(c: Context, fields: FieldErrors): Response {
  return c.json(fields, 400);
}

/**
 * Creates a structured error response.
 *
 * @param code - Machine-readable error code (e.g. 'NOT_FOUND', 'INTERNAL_ERROR')
 * @param message - Human-readable error message
 * @param statusCode - HTTP status code
 * @param details - Optional additional error context
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      // Only include details if provided (avoids undefined in JSON)
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}

/**
 * 500 Internal Server Error. Details are dropped in production.
 */
export function internalError(
  c: Context,
  message: string = 'An internal error occurred',
  details?: unknown
): Response {
  const safeDetails = isProduction() ? undefined : details;
  return error(c, 'INTERNAL_ERROR', message, 500, safeDetails);
}
