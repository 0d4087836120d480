/**
 * Blob Key Derivation
 *
 * Keys are namespaced by the owning resource's id and fixed at upload time:
 *
 *   resources/{resourceId}/files/{filename}    resource attachments
 *   resources/{resourceId}/images/{filename}   resource images
 */

/** Fallback used when nothing of the client's file name survives cleaning */
const FALLBACK_FILENAME = 'file';

/**
 * Reduces a client-supplied file name to a safe single path segment.
 *
 * Directory components are dropped, surrounding whitespace is stripped, inner
 * spaces become underscores, and every character other than letters, digits,
 * '-', '_' and '.' is removed.
 *
 * @example
 * ```typescript
 * safeFilename("My Notes (final).pdf");   // 'My_Notes_final.pdf'
 * safeFilename('../../etc/passwd');       // 'passwd'
 * ```
 */
export function safeFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  const cleaned = base
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_.-]/gu, '');

  if (cleaned === '' || cleaned === '.' || cleaned === '..') {
    return FALLBACK_FILENAME;
  }

  return cleaned;
}

/**
 * Key for a resource's attached file.
 */
export function resourceFileKey(resourceId: number, filename: string): string {
  return `resources/${resourceId}/files/${safeFilename(filename)}`;
}

/**
 * Key for an image owned by a resource.
 */
export function resourceImageKey(resourceId: number, filename: string): string {
  return `resources/${resourceId}/images/${safeFilename(filename)}`;
}

/**
 * Returns `key` with `suffix` inserted before the file extension.
 *
 * @example
 * ```typescript
 * withSuffix('resources/1/images/cover.png', 'a1b2c3d');
 * // 'resources/1/images/cover_a1b2c3d.png'
 * ```
 */
export function withSuffix(key: string, suffix: string): string {
  const slash = key.lastIndexOf('/');
  const dot = key.lastIndexOf('.');

  // No extension, or the only dot leads a hidden file name
  if (dot <= slash + 1) {
    return `${key}_${suffix}`;
  }

  return `${key.slice(0, dot)}_${suffix}${key.slice(dot)}`;
}
