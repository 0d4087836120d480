/**
 * CORS Middleware
 *
 * Lets the browser frontend call the API from another origin. In development
 * the usual local dev-server origins are allowed; in production the origins
 * come from ALLOWED_ORIGINS.
 *
 * @example
 * ```typescript
 * app.use('*', corsMiddleware({ allowedOrigins: config.cors.allowedOrigins }));
 * ```
 */

import { cors } from 'hono/cors';
import type { MiddlewareHandler } from 'hono';

export interface CorsConfig {
  /** Origins allowed to make cross-origin requests */
  allowedOrigins: string[];
  /** HTTP methods allowed for cross-origin requests */
  allowedMethods: string[];
  /** Headers allowed in cross-origin requests */
  allowedHeaders: string[];
  /** How long preflight responses can be cached (seconds) */
  maxAge: number;
}

const DEFAULT_CORS_CONFIG: CorsConfig = {
  allowedOrigins: [
    'http://localhost:3000',
    'http://127.0.0.1:3000',
    'http://localhost:5173',
    'http://127.0.0.1:5173',
  ],
  allowedMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  maxAge: 86400, // 24 hours
};

/**
 * Wraps Hono's CORS middleware with the application's defaults.
 * An empty `allowedOrigins` override falls back to the defaults.
 */
export function corsMiddleware(config: Partial<CorsConfig> = {}): MiddlewareHandler {
  const finalConfig: CorsConfig = {
    ...DEFAULT_CORS_CONFIG,
    ...config,
  };

  const origins =
    finalConfig.allowedOrigins.length > 0
      ? finalConfig.allowedOrigins
      : DEFAULT_CORS_CONFIG.allowedOrigins;

  return cors({
    origin: origins,
    allowMethods: finalConfig.allowedMethods,
    allowHeaders: finalConfig.allowedHeaders,
    maxAge: finalConfig.maxAge,
  });
}

export { DEFAULT_CORS_CONFIG };
