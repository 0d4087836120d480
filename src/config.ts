/**
 * Centralized Configuration Module
 *
 * Provides a type-safe, validated configuration object for the resource
 * library. Values are read from environment variables (a local `.env` file
 * is loaded first) and parsed with a zod schema.
 *
 * Usage:
 *   import { config, validateConfig } from '@/config';
 *
 *   console.log(config.server.port);
 *   console.log(config.media.root);
 *
 *   // Throws ConfigValidationError for production misconfiguration
 *   validateConfig();
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3001),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    path: z.string().default('resource-library.db'),
  }),

  // Uploaded file storage and the URL space it is served under
  media: z.object({
    root: z.string().default('./media'),
    urlPath: z.string().default('/media/'),
    baseUrl: z.string().optional(),
  }),

  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Settings the presentation layer and the blob routes need to turn a stored
 * blob key into a URL.
 */
export type MediaConfig = Config['media'];

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables.
 * Unset variables are left undefined so the schema defaults apply; the
 * schema rejects anything else that is out of range.
 */
function loadFromEnvironment() {
  return {
    server: {
      port: parseIntOrUndefined(process.env.PORT),
      host: process.env.HOST,
      nodeEnv: process.env.NODE_ENV,
    },
    database: {
      path: process.env.DATABASE_PATH,
    },
    media: {
      root: process.env.MEDIA_ROOT,
      urlPath: process.env.MEDIA_URL,
      baseUrl: process.env.MEDIA_BASE_URL || undefined,
    },
    cors: {
      allowedOrigins: parseCommaSeparated(process.env.ALLOWED_ORIGINS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/**
 * Checks settings the schema cannot express on its own.
 *
 * - MEDIA_URL must start and end with '/', since blob keys are appended to it.
 * - MEDIA_BASE_URL, when set, must be an absolute http(s) URL ending in '/'.
 * - In production, ALLOWED_ORIGINS should be set explicitly.
 *
 * @throws {ConfigValidationError} If any check fails
 */
export function validateConfig(current: Config = config): void {
  const invalidVars: { name: string; reason: string }[] = [];

  if (!current.media.urlPath.startsWith('/') || !current.media.urlPath.endsWith('/')) {
    invalidVars.push({
      name: 'MEDIA_URL',
      reason: `must start and end with '/' (got '${current.media.urlPath}')`,
    });
  }

  if (current.media.baseUrl !== undefined) {
    const base = current.media.baseUrl;
    if (!/^https?:\/\//.test(base) || !base.endsWith('/')) {
      invalidVars.push({
        name: 'MEDIA_BASE_URL',
        reason: `must be an absolute http(s) URL ending in '/' (got '${base}')`,
      });
    }
  }

  if (current.server.nodeEnv === 'production' && current.cors.allowedOrigins.length === 0) {
    invalidVars.push({
      name: 'ALLOWED_ORIGINS',
      reason: 'must list the deployed frontend origin(s) in production',
    });
  }

  if (invalidVars.length > 0) {
    const descriptions = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${descriptions}`, invalidVars);
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 */
export const config: Config = parseResult.data;

export function isProduction(): boolean {
  return config.server.nodeEnv === 'production';
}

export function isTest(): boolean {
  return config.server.nodeEnv === 'test';
}

export default config;
