/**
 * Resources API Endpoint Tests
 *
 * Endpoints tested:
 * - GET /api/resources/ - List resources
 * - POST /api/resources/ - Create a resource
 * - GET /api/resources/:id/ - Retrieve a resource
 * - PUT /api/resources/:id/ - Replace a resource
 * - PATCH /api/resources/:id/ - Update some fields
 * - DELETE /api/resources/:id/ - Delete a resource
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import type { ResourcePayload } from '../../src/api/serializers';
import {
  createTestContext,
  cleanupTestContext,
  createTestApp,
  TEST_MEDIA_BASE,
  type TestContext,
} from '../setup';
import {
  createTestResource,
  formRequest,
  getJsonResponse,
  jsonRequest,
  makeFile,
} from '../helpers';

describe('Resources API', () => {
  let ctx: TestContext;
  let app: Hono;

  beforeEach(() => {
    ctx = createTestContext();
    app = createTestApp(ctx);
  });

  afterEach(() => {
    cleanupTestContext(ctx);
  });

  // ==========================================================================
  // GET /api/resources/
  // ==========================================================================
  describe('GET /api/resources/', () => {
    it('should return an empty array when no resources exist', async () => {
      const response = await app.request('/api/resources/');

      expect(response.status).toBe(200);
      expect(await getJsonResponse<ResourcePayload[]>(response)).toEqual([]);
    });

    it('should list the newest resource first', async () => {
      await app.request('/api/resources/', jsonRequest('POST', { title: 'R1' }));
      await app.request('/api/resources/', jsonRequest('POST', { title: 'R2' }));

      const response = await app.request('/api/resources/');
      const json = await getJsonResponse<ResourcePayload[]>(response);

      expect(json.map((r) => r.title)).toEqual(['R2', 'R1']);
    });

    it('should redirect a path without the trailing slash', async () => {
      const response = await app.request('/api/resources');

      expect(response.status).toBe(301);
      expect(response.headers.get('Location')).toBe('http://localhost/api/resources/');
    });
  });

  // ==========================================================================
  // POST /api/resources/
  // ==========================================================================
  describe('POST /api/resources/', () => {
    it('should create a resource from JSON', async () => {
      const response = await app.request(
        '/api/resources/',
        jsonRequest('POST', { title: 'Field Guide', description: 'Birds of the UK' })
      );

      expect(response.status).toBe(201);
      expect(await getJsonResponse<ResourcePayload>(response)).toEqual({
        id: 1,
        title: 'Field Guide',
        description: 'Birds of the UK',
        resource_file: null,
        resource_file_url: null,
        tags: '',
        tags_list: [],
        images: [],
        created_at: '2024-01-01T00:00:00.000Z',
        updated_at: '2024-01-01T00:00:00.000Z',
      });
    });

    it('should normalize tags and return them on retrieval', async () => {
      await app.request('/api/resources/', jsonRequest('POST', { title: 'Tagged', tags: 'x, y , ,z' }));

      const response = await app.request('/api/resources/1/');
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(json.tags).toBe('x, y, z');
      expect(json.tags_list).toEqual(['x', 'y', 'z']);
    });

    it('should trim the title and description', async () => {
      const response = await app.request(
        '/api/resources/',
        jsonRequest('POST', { title: '  Atlas ', description: ' maps\n' })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(json.title).toBe('Atlas');
      expect(json.description).toBe('maps');
    });

    it('should accept a URL-encoded form', async () => {
      const response = await app.request('/api/resources/', {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'title=Handbook&tags=a%2C%2Cb',
      });
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(201);
      expect(json.title).toBe('Handbook');
      expect(json.tags).toBe('a, b');
    });

    it('should store an uploaded file and return its absolute URL', async () => {
      const response = await app.request(
        '/api/resources/',
        formRequest('POST', {
          title: 'Notes',
          resource_file: makeFile('My Notes.pdf', 'hello'),
        })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(201);
      expect(json.resource_file).toBe('resources/1/files/My_Notes.pdf');
      expect(json.resource_file_url).toBe(`${TEST_MEDIA_BASE}resources/1/files/My_Notes.pdf`);

      const stored = await ctx.blobs.read('resources/1/files/My_Notes.pdf');
      expect(new TextDecoder().decode(stored ?? new Uint8Array())).toBe('hello');
    });

    it('should reject a missing title', async () => {
      const response = await app.request('/api/resources/', jsonRequest('POST', { tags: 'a' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ title: ['This field is required.'] });
    });

    it('should reject a blank title', async () => {
      const response = await app.request('/api/resources/', jsonRequest('POST', { title: '   ' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ title: ['This field may not be blank.'] });
    });

    it('should reject a null title', async () => {
      const response = await app.request('/api/resources/', jsonRequest('POST', { title: null }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ title: ['This field may not be null.'] });
    });

    it('should reject a title that is not a string', async () => {
      const response = await app.request(
        '/api/resources/',
        jsonRequest('POST', { title: ['a'], tags: null })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        title: ['Not a valid string.'],
        tags: ['This field may not be null.'],
      });
    });

    it('should reject a form value in place of a file', async () => {
      const response = await app.request(
        '/api/resources/',
        formRequest('POST', { title: 'Notes', resource_file: 'not-a-file' })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        resource_file: ['The submitted data was not a file. Check the encoding type on the form.'],
      });
    });

    it('should reject an empty file', async () => {
      const response = await app.request(
        '/api/resources/',
        formRequest('POST', { title: 'Notes', resource_file: makeFile('empty.txt', '') })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ resource_file: ['The submitted file is empty.'] });
    });

    it('should treat a blank file input as no file', async () => {
      const boundary = 'form-boundary';
      const body = [
        `--${boundary}`,
        'Content-Disposition: form-data; name="title"',
        '',
        'Notes',
        `--${boundary}`,
        'Content-Disposition: form-data; name="resource_file"; filename=""',
        'Content-Type: application/octet-stream',
        '',
        '',
        `--${boundary}--`,
        '',
      ].join('\r\n');

      const response = await app.request('/api/resources/', {
        method: 'POST',
        headers: { 'Content-Type': `multipart/form-data; boundary=${boundary}` },
        body,
      });
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(201);
      expect(json.title).toBe('Notes');
      expect(json.resource_file).toBeNull();
    });

    it('should reject malformed JSON', async () => {
      const response = await app.request('/api/resources/', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"title":',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ detail: ['JSON parse error'] });
    });

    it('should reject a JSON body that is not an object', async () => {
      const response = await app.request('/api/resources/', jsonRequest('POST', ['Atlas']));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        non_field_errors: ['Invalid data. Expected a dictionary.'],
      });
    });
  });

  // ==========================================================================
  // GET /api/resources/:id/
  // ==========================================================================
  describe('GET /api/resources/:id/', () => {
    it('should return 404 with an empty body for an unknown id', async () => {
      const response = await app.request('/api/resources/999/');

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('');
    });

    it('should return 404 for an id that is not a positive integer', async () => {
      const response = await app.request('/api/resources/abc/');

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('');
    });
  });

  // ==========================================================================
  // PATCH /api/resources/:id/
  // ==========================================================================
  describe('PATCH /api/resources/:id/', () => {
    it('should change only the supplied fields and bump updated_at', async () => {
      const created = await createTestResource(ctx.repos, { title: 'Atlas', tags: 'maps' });

      const response = await app.request(
        `/api/resources/${created.id}/`,
        jsonRequest('PATCH', { description: 'Pocket edition' })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(200);
      expect(json.title).toBe('Atlas');
      expect(json.description).toBe('Pocket edition');
      expect(json.tags).toBe('maps');
      expect(json.created_at).toBe('2024-01-01T00:00:00.000Z');
      expect(json.updated_at).toBe('2024-01-01T00:00:01.000Z');
    });

    it('should reject a blank title', async () => {
      const created = await createTestResource(ctx.repos);

      const response = await app.request(
        `/api/resources/${created.id}/`,
        jsonRequest('PATCH', { title: '' })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ title: ['This field may not be blank.'] });
    });

    it('should replace the file and remove the previous blob', async () => {
      await app.request(
        '/api/resources/',
        formRequest('POST', { title: 'Notes', resource_file: makeFile('a.txt', 'first') })
      );

      const response = await app.request(
        '/api/resources/1/',
        formRequest('PATCH', { resource_file: makeFile('b.txt', 'second') })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(json.resource_file).toBe('resources/1/files/b.txt');
      expect(await ctx.blobs.exists('resources/1/files/a.txt')).toBe(false);
      expect(await ctx.blobs.exists('resources/1/files/b.txt')).toBe(true);
    });

    it('should clear the file when resource_file is null', async () => {
      await app.request(
        '/api/resources/',
        formRequest('POST', { title: 'Notes', resource_file: makeFile('a.txt', 'first') })
      );

      const response = await app.request(
        '/api/resources/1/',
        jsonRequest('PATCH', { resource_file: null })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(json.resource_file).toBeNull();
      expect(json.resource_file_url).toBeNull();
      expect(await ctx.blobs.exists('resources/1/files/a.txt')).toBe(false);
    });

    it('should clear the file when resource_file is an empty form value', async () => {
      await app.request(
        '/api/resources/',
        formRequest('POST', { title: 'Notes', resource_file: makeFile('a.txt', 'first') })
      );

      const response = await app.request(
        '/api/resources/1/',
        formRequest('PATCH', { resource_file: '' })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(200);
      expect(json.title).toBe('Notes');
      expect(json.resource_file).toBeNull();
      expect(await ctx.blobs.exists('resources/1/files/a.txt')).toBe(false);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await app.request(
        '/api/resources/999/',
        jsonRequest('PATCH', { title: 'Anything' })
      );

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('');
    });

    it('should return 404 for an unknown id before validating the body', async () => {
      const invalid = await app.request(
        '/api/resources/999/',
        jsonRequest('PATCH', { title: ['a'] })
      );
      const malformed = await app.request('/api/resources/999/', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json' },
        body: '{"title":',
      });

      expect(invalid.status).toBe(404);
      expect(await invalid.text()).toBe('');
      expect(malformed.status).toBe(404);
    });
  });

  // ==========================================================================
  // PUT /api/resources/:id/
  // ==========================================================================
  describe('PUT /api/resources/:id/', () => {
    it('should reset omitted fields to their defaults', async () => {
      const created = await createTestResource(ctx.repos, {
        title: 'Atlas',
        description: 'Maps',
        tags: 'geo, travel',
      });

      const response = await app.request(
        `/api/resources/${created.id}/`,
        jsonRequest('PUT', { title: 'World Atlas' })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(200);
      expect(json.title).toBe('World Atlas');
      expect(json.description).toBeNull();
      expect(json.tags).toBe('');
      expect(json.tags_list).toEqual([]);
    });

    it('should keep the file when it is omitted', async () => {
      await app.request(
        '/api/resources/',
        formRequest('POST', { title: 'Notes', resource_file: makeFile('a.txt', 'first') })
      );

      const response = await app.request('/api/resources/1/', jsonRequest('PUT', { title: 'Renamed' }));
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(json.resource_file).toBe('resources/1/files/a.txt');
    });

    it('should replace the file from a multipart body', async () => {
      await app.request(
        '/api/resources/',
        formRequest('POST', {
          title: 'Notes',
          tags: 'a',
          resource_file: makeFile('a.txt', 'first'),
        })
      );

      const response = await app.request(
        '/api/resources/1/',
        formRequest('PUT', { title: 'Notes v2', resource_file: makeFile('b.txt', 'second') })
      );
      const json = await getJsonResponse<ResourcePayload>(response);

      expect(response.status).toBe(200);
      expect(json.title).toBe('Notes v2');
      expect(json.tags).toBe('');
      expect(json.resource_file).toBe('resources/1/files/b.txt');
      expect(json.resource_file_url).toBe(`${TEST_MEDIA_BASE}resources/1/files/b.txt`);
      expect(await ctx.blobs.exists('resources/1/files/a.txt')).toBe(false);

      const stored = await ctx.blobs.read('resources/1/files/b.txt');
      expect(new TextDecoder().decode(stored ?? new Uint8Array())).toBe('second');
    });

    it('should require a title', async () => {
      const created = await createTestResource(ctx.repos);

      const response = await app.request(
        `/api/resources/${created.id}/`,
        jsonRequest('PUT', { description: 'No title' })
      );

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ title: ['This field is required.'] });
    });
  });

  // ==========================================================================
  // DELETE /api/resources/:id/
  // ==========================================================================
  describe('DELETE /api/resources/:id/', () => {
    it('should delete the resource', async () => {
      const created = await createTestResource(ctx.repos);

      const response = await app.request(`/api/resources/${created.id}/`, { method: 'DELETE' });

      expect(response.status).toBe(204);
      expect((await app.request(`/api/resources/${created.id}/`)).status).toBe(404);
    });

    it('should return 404 for an unknown id', async () => {
      const response = await app.request('/api/resources/999/', { method: 'DELETE' });

      expect(response.status).toBe(404);
      expect(await response.text()).toBe('');
    });
  });

  // ==========================================================================
  // Other routes
  // ==========================================================================
  describe('unmatched routes', () => {
    it('should return a structured 404', async () => {
      const response = await app.request('/api/unknown/');

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: { code: 'NOT_FOUND', message: 'Route GET /api/unknown/ not found' },
      });
    });
  });
});
