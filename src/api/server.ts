/**
 * Resource Library API Server
 *
 * Opens the SQLite database, applies pending migrations, and serves the Hono
 * app on Node through @hono/node-server.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT            - Preferred port (default: 3001)
 *   HOST            - Interface to bind (default: 0.0.0.0)
 *   DATABASE_PATH   - SQLite file (default: resource-library.db)
 *   MEDIA_ROOT      - Blob directory (default: ./media)
 *   MEDIA_URL       - URL path blobs are served under (default: /media/)
 *   MEDIA_BASE_URL  - Absolute base for blob URLs in responses (optional)
 *   ALLOWED_ORIGINS - Comma-separated CORS origins
 */

import { createServer } from 'node:net';
import { serve } from '@hono/node-server';
import { config, isTest, validateConfig } from '@/config';
import {
  ImageRepository,
  LocalBlobStore,
  openDatabase,
  ResourceRepository,
  runMigrations,
} from '@/storage';
import { createApp } from './app';

/** Highest port tried before giving up */
const MAX_PORT_OFFSET = 100;

/**
 * Finds a free port, trying `preferredPort` first and then each following
 * port up to `maxPort`.
 *
 * @throws Error if every port in the range is taken
 */
export async function findAvailablePort(
  preferredPort: number,
  maxPort: number = preferredPort + MAX_PORT_OFFSET
): Promise<number> {
  for (let port = preferredPort; port <= maxPort; port++) {
    const free = await new Promise<boolean>((resolve) => {
      const candidate = createServer();

      candidate.once('error', () => resolve(false));
      candidate.listen(port, config.server.host, () => {
        candidate.close(() => resolve(true));
      });
    });

    if (free) {
      return port;
    }

    console.log(`[Server] Port ${port} is in use, trying ${port + 1}...`);
  }

  throw new Error(`No available port found in range ${preferredPort}-${maxPort}`);
}

/**
 * Starts the HTTP server.
 *
 * 1. Validates configuration
 * 2. Opens the database and applies migrations
 * 3. Wires repositories to the media directory
 * 4. Serves on the first free port from PORT
 */
export async function startServer(): Promise<void> {
  validateConfig();

  const { db, sqlite } = openDatabase(config.database.path);
  const applied = runMigrations(sqlite);
  if (applied.length > 0) {
    console.log(`[Server] Applied migrations: ${applied.join(', ')}`);
  }

  const blobs = new LocalBlobStore(config.media.root);
  const app = createApp(
    {
      resources: new ResourceRepository(db, blobs),
      images: new ImageRepository(db, blobs),
      blobs,
      media: config.media,
    },
    {
      logRequests: !isTest(),
      allowedOrigins: config.cors.allowedOrigins,
    }
  );

  const port = await findAvailablePort(config.server.port);

  const server = serve({ fetch: app.fetch, port, hostname: config.server.host }, (info) => {
    console.log('');
    console.log('[Server] Resource Library API');
    console.log(`[Server]   Listening:   http://localhost:${info.port}`);
    console.log(`[Server]   Environment: ${config.server.nodeEnv}`);
    console.log(`[Server]   Database:    ${config.database.path}`);
    console.log(`[Server]   Media root:  ${config.media.root}`);
    console.log(`[Server]   Health:      http://localhost:${info.port}/health`);
    console.log(`[Server]   API:         http://localhost:${info.port}/api`);
    console.log('');
  });

  const shutdown = (signal: string) => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    server.close(() => {
      sqlite.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

startServer().catch((error: unknown) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
