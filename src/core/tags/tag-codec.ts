/**
 * Tag Codec
 *
 * Resources store their tags as a single comma-separated string. Clients may
 * send that string with arbitrary spacing and empty segments ("x, y , ,z");
 * on write it is normalized to a canonical form ("x, y, z"), and on read it
 * is additionally exposed as an ordered list (["x", "y", "z"]).
 *
 * Decoding never deduplicates: "a, a" decodes to ["a", "a"].
 */

/** Separator used in the canonical stored form */
export const TAG_SEPARATOR = ', ';

/**
 * Splits a stored or client-supplied tag string into its tags.
 *
 * Each comma-separated segment is trimmed; empty segments are dropped and
 * order is preserved.
 *
 * @example
 * ```typescript
 * decodeTags('a, , b,  c ');  // ['a', 'b', 'c']
 * decodeTags('');             // []
 * ```
 */
export function decodeTags(raw: string | null | undefined): string[] {
  if (!raw) {
    return [];
  }

  return raw
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

/**
 * Joins a list of tags into the canonical stored form.
 * Tags are trimmed and empty ones dropped, the same as decoding would.
 *
 * @example
 * ```typescript
 * encodeTags(['a', 'b']);  // 'a, b'
 * encodeTags([]);          // ''
 * ```
 */
export function encodeTags(tags: readonly string[]): string {
  return tags
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0)
    .join(TAG_SEPARATOR);
}

/**
 * Rewrites client-supplied tag text into the canonical stored form.
 *
 * `decodeTags(normalizeTags(raw))` always equals `decodeTags(raw)`.
 *
 * @example
 * ```typescript
 * normalizeTags('x, y , ,z');  // 'x, y, z'
 * ```
 */
export function normalizeTags(raw: string | null | undefined): string {
  return encodeTags(decodeTags(raw));
}
