/**
 * Test Helpers Module
 *
 * Request builders and fixtures shared by the API and integration tests.
 */

import type { TestRepositories } from './setup';
import type { Resource } from '../src/core/models';
import type { ResourceFields } from '../src/storage/repositories';

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Bytes of a small fake PNG. Only the signature is real; nothing decodes it.
 */
export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3]);

/**
 * Creates an in-memory file for multipart uploads.
 */
export function makeFile(
  name: string,
  content: BlobPart = 'file body',
  type = 'application/octet-stream'
): File {
  return new File([content], name, { type });
}

/**
 * Creates a resource directly through the repository.
 */
export async function createTestResource(
  repos: TestRepositories,
  fields: ResourceFields = {}
): Promise<Resource> {
  return repos.resourceRepo.create({ title: 'Test Resource', ...fields });
}

// ============================================================================
// Request Builders
// ============================================================================

/**
 * RequestInit for a JSON body.
 */
export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}

/**
 * RequestInit for a multipart body. Values that are files are appended as
 * files; everything else as text.
 */
export function formRequest(method: string, fields: Record<string, string | File>): RequestInit {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }
  return { method, body: form };
}

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Parses a JSON response body.
 */
export async function getJsonResponse<T>(response: Response): Promise<T> {
  return response.json() as Promise<T>;
}
