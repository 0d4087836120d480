/**
 * Domain Errors
 *
 * Repositories throw these when an operation cannot proceed. The API layer's
 * error handler turns them into HTTP responses:
 *
 * - NotFoundError   → 404 with an empty body
 * - ValidationError → 400 with a `{ field: [messages] }` body
 *
 * @example
 * ```typescript
 * const resource = await repo.findById(id);
 * if (!resource) {
 *   throw new NotFoundError('Resource', id);
 * }
 * ```
 */

/**
 * Field name → human-readable messages, in the order they were raised.
 */
export type FieldErrors = Record<string, string[]>;

/**
 * Messages shared by every layer that reports field errors.
 */
export const FieldMessages = {
  REQUIRED: 'This field is required.',
  BLANK: 'This field may not be blank.',
  NULL: 'This field may not be null.',
  NOT_A_STRING: 'Not a valid string.',
  NOT_A_FILE: 'The submitted data was not a file. Check the encoding type on the form.',
  EMPTY_FILE: 'The submitted file is empty.',
  IMAGE_REQUIRED: 'Image file is required.',
} as const;

/**
 * Raised when a referenced record does not exist.
 */
export class NotFoundError extends Error {
  public readonly entity: string;
  public readonly id: string | number;

  constructor(entity: string, id: string | number) {
    super(`${entity} with ID '${id}' not found`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;

    Error.captureStackTrace?.(this, NotFoundError);
  }
}

/**
 * Raised when input is missing a required field or carries one of the wrong
 * kind.
 */
export class ValidationError extends Error {
  public readonly fields: FieldErrors;

  constructor(fields: FieldErrors) {
    super(`Invalid input: ${Object.keys(fields).join(', ')}`);
    this.name = 'ValidationError';
    this.fields = fields;

    Error.captureStackTrace?.(this, ValidationError);
  }

  /**
   * Shorthand for the common single-field, single-message case.
   */
  static forField(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }
}
