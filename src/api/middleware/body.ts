/**
 * Request Body Parsing and Validation
 *
 * Resource endpoints accept JSON, URL-encoded forms and multipart forms (the
 * latter carrying file uploads). readBody() turns any of these into a plain
 * field map; readValidatedBody() then checks it against a zod schema and
 * raises a ValidationError with per-field messages when it does not fit.
 *
 * @example
 * ```typescript
 * router.post('/', async (c) => {
 *   const body = await readValidatedBody(c, resourceFieldsSchema);
 *   // body.title: string | null | undefined
 * });
 * ```
 */

import type { Context } from 'hono';
import { z } from 'zod';
import { ValidationError, type FieldErrors } from '@/core/errors';

/** Key used for errors that do not belong to a single field */
export const NON_FIELD_ERRORS = 'non_field_errors';

const FORM_CONTENT_TYPES = ['multipart/form-data', 'application/x-www-form-urlencoded'];

const jsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * Groups zod issues by their top-level field.
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};

  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : NON_FIELD_ERRORS;
    (fields[field] ??= []).push(issue.message);
  }

  return fields;
}

/**
 * Reads the request body as a field map.
 *
 * Form bodies keep uploaded files as `File` values. An empty JSON body reads
 * as `{}`.
 *
 * @throws ValidationError for malformed JSON or a JSON body that is not an object
 */
export async function readBody(c: Context): Promise<Record<string, unknown>> {
  const contentType = (c.req.header('Content-Type') ?? '').toLowerCase();

  if (FORM_CONTENT_TYPES.some((type) => contentType.startsWith(type))) {
    return c.req.parseBody();
  }

  const text = await c.req.text();
  if (text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw ValidationError.forField('detail', 'JSON parse error');
    }
    throw err;
  }

  const result = jsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw ValidationError.forField(NON_FIELD_ERRORS, 'Invalid data. Expected a dictionary.');
  }

  return result.data;
}

/**
 * Reads the body and validates it against `schema`.
 *
 * @returns The schema's parsed output
 * @throws ValidationError listing every failing field
 */
export async function readValidatedBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.infer<T>> {
  const body = await readBody(c);
  const result = schema.safeParse(body);

  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }

  return result.data;
}
