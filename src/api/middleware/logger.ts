/**
 * Request Logger Middleware
 *
 * One line per request, written after the response is produced:
 * ```
 * [API] GET /api/resources/ 200 - 4ms
 * [API] POST /api/resources/12/images/ 201 - 31ms
 * [API] DELETE /api/images/99/ 404 - 2ms
 * ```
 *
 * @example
 * ```typescript
 * app.use('*', loggerMiddleware({ skipPaths: ['/health', '/media/'] }));
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  /** Prefix for log lines */
  prefix: string;
  /** Prepend an ISO timestamp */
  includeTimestamp: boolean;
  /** Path prefixes that are never logged */
  skipPaths: string[];
  /** ANSI colors for terminal output */
  colorize: boolean;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  includeTimestamp: false,
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  if (status >= 200) return colors.green;
  return colors.dim;
}

function getMethodColor(method: string): string {
  switch (method.toUpperCase()) {
    case 'GET':
      return colors.cyan;
    case 'POST':
      return colors.green;
    case 'PUT':
    case 'PATCH':
      return colors.yellow;
    case 'DELETE':
      return colors.red;
    default:
      return colors.magenta;
  }
}

/**
 * Milliseconds below one second, seconds with two decimals above.
 */
export function formatResponseTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Builds a log line for a finished request.
 */
export function formatRequestLog(
  config: LoggerConfig,
  method: string,
  path: string,
  status: number,
  responseTime: number
): string {
  let line: string;

  if (config.colorize) {
    line = [
      config.prefix,
      `${getMethodColor(method)}${method.padEnd(7)}${colors.reset}`,
      path,
      `${getStatusColor(status)}${status}${colors.reset}`,
      '-',
      `${colors.dim}${formatResponseTime(responseTime)}${colors.reset}`,
    ].join(' ');
  } else {
    line = `${config.prefix} ${method} ${path} ${status} - ${formatResponseTime(responseTime)}`;
  }

  if (config.includeTimestamp) {
    line = `[${new Date().toISOString()}] ${line}`;
  }

  return line;
}

/**
 * Creates the request logger.
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = Math.round(performance.now() - startTime);

    console.log(formatRequestLog(finalConfig, c.req.method, path, c.res.status, responseTime));
  };
}

export { DEFAULT_LOGGER_CONFIG };
