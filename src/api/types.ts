/**
 * API Types
 *
 * Request schemas and shared type definitions for the HTTP layer.
 *
 * Resource and image payloads are returned bare (no envelope), matching
 * what the frontend client consumes. Field errors are returned as
 * `{ field: [messages] }`. Only unexpected failures and unmatched routes use
 * the `{ error: { code, message } }` shape below.
 */

import { z } from 'zod';
import type { MediaConfig } from '@/config';
import type { BlobStore } from '@/storage/blobs';
import type { ImageRepository, ResourceRepository } from '@/storage/repositories';
import { FieldMessages } from '@/core/errors';

// ============================================================================
// Error Response Types
// ============================================================================

export interface ApiError {
  /** Machine-readable error code, e.g. 'INTERNAL_ERROR' */
  code: string;
  /** Human-readable description */
  message: string;
  /** Extra context, only outside production */
  details?: unknown;
}

export interface ApiErrorResponse {
  error: ApiError;
}

// ============================================================================
// Route Dependencies
// ============================================================================

/**
 * Everything the route factories need, injected once at startup.
 */
export interface ApiDependencies {
  resources: ResourceRepository;
  images: ImageRepository;
  blobs: BlobStore;
  media: MediaConfig;
}

// ============================================================================
// Field Schemas
// ============================================================================

/**
 * A text field. Numbers and booleans are accepted and stringified, since
 * form-encoded and JSON clients disagree on how to send them.
 */
function textField(options: { nullable: boolean }) {
  return z.unknown().transform((value, ctx): string | null | undefined => {
    if (value === undefined) {
      return undefined;
    }

    if (value === null) {
      if (options.nullable) {
        return null;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.NULL });
      return z.NEVER;
    }

    if (typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }

    if (typeof value !== 'string') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.NOT_A_STRING });
      return z.NEVER;
    }

    return value;
  });
}

/**
 * An optional upload. `null` (JSON) or an empty form value clears the
 * current file; any other non-file value, or a zero-byte file, is rejected.
 * A nameless empty part is what a browser sends for a file input left blank,
 * and counts as not supplied.
 */
const fileField = z.unknown().transform((value, ctx): File | null | undefined => {
  if (value === undefined) {
    return undefined;
  }

  if (value === null || value === '') {
    return null;
  }

  if (!(value instanceof File)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.NOT_A_FILE });
    return z.NEVER;
  }

  if (value.name === '' && value.size === 0) {
    return undefined;
  }

  if (value.size === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.EMPTY_FILE });
    return z.NEVER;
  }

  return value;
});

// ============================================================================
// Request Schemas
// ============================================================================

/**
 * Body of POST /resources/, PUT and PATCH /resources/:id/.
 *
 * Only shapes are checked here; whether the title is present and non-blank
 * is decided by the repository, which knows if the write is partial.
 */
export const resourceFieldsSchema = z.object({
  title: textField({ nullable: true }),
  description: textField({ nullable: true }),
  tags: textField({ nullable: false }),
  resource_file: fileField,
});

export type ResourceFieldsBody = z.infer<typeof resourceFieldsSchema>;

/**
 * Body of POST /resources/:id/images/. A missing, empty or non-file `image`
 * is reported by the repository once the resource is known to exist.
 */
export const imageUploadSchema = z.object({
  image: z
    .unknown()
    .transform((value) => (value instanceof File && value.size > 0 ? value : null)),
  caption: textField({ nullable: true }),
});

export type ImageUploadBody = z.infer<typeof imageUploadSchema>;
