/**
 * Hono Application Factory
 *
 * Builds the application around injected repositories and blob store, so the
 * server and the tests run the same app against different storage.
 *
 * Middleware and routes, in order:
 * 1. Error handler (app.onError) and 404 handler (app.notFound)
 * 2. Request logger
 * 3. CORS
 * 4. /health, /api, and the media path
 */

import { Hono } from 'hono';
import { appendTrailingSlash } from 'hono/trailing-slash';
import {
  corsMiddleware,
  errorHandler,
  loggerMiddleware,
  routeNotFoundHandler,
} from './middleware';
import { createApiRouter, healthRoutes, mediaRoutes } from './routes';
import type { ApiDependencies } from './types';

export interface AppOptions {
  /** Log one line per request (off in tests) */
  logRequests?: boolean;
  /** Origins allowed by CORS; empty means the development defaults */
  allowedOrigins?: string[];
}

export function createApp(deps: ApiDependencies, options: AppOptions = {}): Hono {
  const app = new Hono();

  app.onError(errorHandler);
  app.notFound(routeNotFoundHandler);

  if (options.logRequests ?? true) {
    app.use('*', loggerMiddleware());
  }

  app.use('*', corsMiddleware({ allowedOrigins: options.allowedOrigins ?? [] }));

  // GET /api/resources → /api/resources/ instead of a 404
  app.use('/api/*', appendTrailingSlash());

  app.route('/health', healthRoutes());
  app.route('/api', createApiRouter(deps));
  app.route('/', mediaRoutes(deps.blobs, deps.media.urlPath));

  return app;
}
