/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler);
 * app.notFound(routeNotFoundHandler);
 * app.use('*', loggerMiddleware());
 * app.use('*', corsMiddleware());
 * ```
 */

export {
  corsMiddleware,
  DEFAULT_CORS_CONFIG,
  type CorsConfig,
} from './cors';

export {
  errorHandler,
  routeNotFoundHandler,
  ErrorCodes,
  type ErrorCode,
} from './error-handler';

export {
  loggerMiddleware,
  formatRequestLog,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';

export {
  readBody,
  readValidatedBody,
  toFieldErrors,
  NON_FIELD_ERRORS,
} from './body';
