/**
 * Request helpers shared by the route modules.
 */

import type { UploadedFile } from '@/storage/blobs';

/**
 * Parses a path id. Anything other than a positive integer yields null, which
 * routes report as 404 like any other unknown id.
 */
export function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !/^[1-9]\d*$/.test(raw)) {
    return null;
  }

  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Reads an uploaded form file into memory.
 */
export async function toUploadedFile(file: File): Promise<UploadedFile> {
  return {
    filename: file.name,
    content: new Uint8Array(await file.arrayBuffer()),
  };
}
