/**
 * API Routes Aggregator
 *
 * Combines the route modules into the router mounted at /api.
 *
 * Route Structure:
 * - /health                      liveness (mounted at root, not under /api)
 * - /api                         API info
 * - /api/resources/...           resource CRUD and image upload
 * - /api/images/:id/             image delete
 * - {MEDIA_URL}*                 stored blobs (mounted at root)
 *
 * @example
 * ```typescript
 * app.route('/health', healthRoutes());
 * app.route('/api', createApiRouter(deps));
 * app.route('/', mediaRoutes(deps.blobs, deps.media.urlPath));
 * ```
 */

import { Hono } from 'hono';
import type { ApiDependencies } from '../types';
import { success } from '../utils/response';
import { APP_VERSION } from './health';
import { imagesRoutes } from './images';
import { resourcesRoutes } from './resources';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { resourcesRoutes } from './resources';
export { imagesRoutes } from './images';
export { mediaRoutes, blobKeyFromUrl } from './media';

/**
 * Payload of GET /api.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    method: string;
    path: string;
    description: string;
  }[];
}

const API_INFO: ApiInfo = {
  name: 'Resource Library API',
  version: APP_VERSION,
  endpoints: [
    { method: 'GET', path: '/api/resources/', description: 'List resources, newest first' },
    { method: 'POST', path: '/api/resources/', description: 'Create a resource' },
    { method: 'GET', path: '/api/resources/{id}/', description: 'Retrieve a resource' },
    { method: 'PUT', path: '/api/resources/{id}/', description: 'Replace a resource' },
    { method: 'PATCH', path: '/api/resources/{id}/', description: 'Update some fields of a resource' },
    { method: 'DELETE', path: '/api/resources/{id}/', description: 'Delete a resource and its images' },
    { method: 'POST', path: '/api/resources/{id}/images/', description: 'Upload an image' },
    { method: 'DELETE', path: '/api/images/{id}/', description: 'Delete an image' },
  ],
};

/**
 * Creates the main API router with all routes mounted.
 */
export function createApiRouter(deps: ApiDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => success(c, API_INFO));

  router.route('/', resourcesRoutes(deps));
  router.route('/', imagesRoutes(deps));

  return router;
}
