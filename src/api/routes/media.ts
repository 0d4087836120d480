/**
 * Media Routes
 *
 * Serves stored blobs under the media URL path so the absolute URLs in
 * resource and image payloads resolve. The content type is taken from the
 * key's extension.
 *
 * @example
 * ```typescript
 * app.route('/', mediaRoutes(blobs, '/media/'));
 * // GET /media/resources/4/images/cover.png → image/png
 * ```
 */

import { Hono } from 'hono';
import { getMimeType } from 'hono/utils/mime';
import { InvalidBlobKeyError, type BlobStore } from '@/storage/blobs';
import { notFound } from '../utils/response';

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/**
 * Extracts the blob key following `prefix` from a request URL.
 * Returns null when the path is not under the prefix or is not valid
 * percent-encoding.
 */
export function blobKeyFromUrl(requestUrl: string, prefix: string): string | null {
  const pathname = new URL(requestUrl).pathname;
  const base = prefix.endsWith('/') ? prefix : `${prefix}/`;

  if (!pathname.startsWith(base)) {
    return null;
  }

  try {
    return decodeURIComponent(pathname.slice(base.length));
  } catch (err) {
    if (err instanceof URIError) {
      return null;
    }
    throw err;
  }
}

function toArrayBuffer(content: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(content.byteLength);
  new Uint8Array(buffer).set(content);
  return buffer;
}

/**
 * Creates the media router. Its route carries the full `urlPath`, so mount
 * it at the root.
 */
export function mediaRoutes(blobs: BlobStore, urlPath: string): Hono {
  const router = new Hono();

  router.get(`${urlPath}*`, async (c) => {
    const key = blobKeyFromUrl(c.req.url, urlPath);
    if (!key) {
      return notFound(c);
    }

    let content: Uint8Array | null;
    try {
      content = await blobs.read(key);
    } catch (err) {
      if (err instanceof InvalidBlobKeyError) {
        return notFound(c);
      }
      throw err;
    }

    if (!content) {
      return notFound(c);
    }

    return c.body(toArrayBuffer(content), 200, {
      'Content-Type': getMimeType(key) ?? FALLBACK_CONTENT_TYPE,
    });
  });

  return router;
}
