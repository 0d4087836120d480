/**
 * Cascade Delete Integration Tests
 *
 * Deleting a resource removes its images' rows and blobs, its own file blob,
 * and the directories those blobs lived in.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { createTestContext, cleanupTestContext, createTestApp, type TestContext } from '../setup';
import { formRequest, makeFile, PNG_BYTES } from '../helpers';

function countRows(ctx: TestContext, table: 'resources' | 'resource_images'): number {
  const row = ctx.sqlite
    .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`)
    .get();
  return row?.count ?? 0;
}

describe('Resource cascade delete', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(async () => {
    ctx = createTestContext();
    app = createTestApp(ctx);

    await app.request(
      '/api/resources/',
      formRequest('POST', { title: 'Album', resource_file: makeFile('album.zip', 'zip') })
    );
    await app.request(
      '/api/resources/1/images/',
      formRequest('POST', { image: makeFile('one.png', PNG_BYTES) })
    );
    await app.request(
      '/api/resources/1/images/',
      formRequest('POST', { image: makeFile('two.png', PNG_BYTES) })
    );
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  it('should remove the resource and image rows', async () => {
    expect(countRows(ctx, 'resource_images')).toBe(2);

    const response = await app.request('/api/resources/1/', { method: 'DELETE' });

    expect(response.status).toBe(204);
    expect(countRows(ctx, 'resources')).toBe(0);
    expect(countRows(ctx, 'resource_images')).toBe(0);
  });

  it('should remove every blob and prune the resource directory', async () => {
    await app.request('/api/resources/1/', { method: 'DELETE' });

    expect(await ctx.blobs.exists('resources/1/files/album.zip')).toBe(false);
    expect(await ctx.blobs.exists('resources/1/images/one.png')).toBe(false);
    expect(await ctx.blobs.exists('resources/1/images/two.png')).toBe(false);
    expect(existsSync(join(ctx.mediaRoot, 'resources', '1'))).toBe(false);
  });

  it('should leave other resources alone', async () => {
    await app.request(
      '/api/resources/',
      formRequest('POST', { title: 'Other', resource_file: makeFile('keep.txt', 'keep') })
    );

    await app.request('/api/resources/1/', { method: 'DELETE' });

    expect(countRows(ctx, 'resources')).toBe(1);
    expect(await ctx.blobs.exists('resources/2/files/keep.txt')).toBe(true);
  });

  it('should make the deleted image ids unknown', async () => {
    await app.request('/api/resources/1/', { method: 'DELETE' });

    const response = await app.request('/api/images/1/', { method: 'DELETE' });
    expect(response.status).toBe(404);
  });
});

describe('Image foreign key', () => {
  it('should cascade when the resource row is deleted directly', async () => {
    const ctx = createTestContext();
    try {
      const resource = await ctx.repos.resourceRepo.create({ title: 'Direct' });
      await ctx.repos.imageRepo.create({
        resourceId: resource.id,
        image: { filename: 'a.png', content: PNG_BYTES },
      });

      ctx.sqlite.prepare('DELETE FROM resources WHERE id = ?').run(resource.id);

      expect(countRows(ctx, 'resource_images')).toBe(0);
    } finally {
      cleanupTestContext(ctx);
    }
  });
});
