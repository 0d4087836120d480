/**
 * Media URL helpers.
 */

import type { MediaConfig } from '@/config';

/**
 * Joins a media base URL and a stored blob key, percent-encoding each
 * segment of the key.
 *
 * @example
 * ```typescript
 * absoluteUrl('http://localhost:3001/media/', 'resources/4/files/notes.pdf');
 * // 'http://localhost:3001/media/resources/4/files/notes.pdf'
 *
 * absoluteUrl('http://localhost:3001/media/', 'resources/4/files/résumé.txt');
 * // 'http://localhost:3001/media/resources/4/files/r%C3%A9sum%C3%A9.txt'
 *
 * absoluteUrl('http://localhost:3001/media/', null); // null
 * ```
 */
export function absoluteUrl(baseUrl: string, blobPath: string | null | undefined): string | null {
  if (!blobPath) {
    return null;
  }
  return baseUrl + blobPath.split('/').map(encodeURIComponent).join('/');
}

/**
 * The base URL blobs are served under for a given request.
 *
 * A configured MEDIA_BASE_URL wins (for deployments behind a proxy or CDN);
 * otherwise the media path is resolved against the request's own origin.
 */
export function resolveMediaBaseUrl(media: MediaConfig, requestUrl: string): string {
  if (media.baseUrl) {
    return media.baseUrl;
  }
  return new URL(media.urlPath, requestUrl).toString();
}
