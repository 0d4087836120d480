/**
 * Health Check Route
 *
 * Liveness endpoint for load balancers and uptime monitors. It does not
 * touch the database or the media directory.
 *
 * @example
 * ```bash
 * curl http://localhost:3001/health
 * # { "status": "ok", "timestamp": "2024-01-15T10:30:00.000Z",
 * #   "environment": "development", "version": "0.1.0" }
 * ```
 */

import { Hono } from 'hono';
import { config } from '@/config';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  /** ISO 8601 time of the check */
  timestamp: string;
  environment: string;
  version: string;
}

/** Should match package.json version */
export const APP_VERSION = '0.1.0';

export function healthRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      version: APP_VERSION,
    };

    return success(c, healthData);
  });

  return router;
}
