/**
 * API Module - Barrel Export
 *
 * The HTTP layer of the resource library: a Hono app built around injected
 * repositories. The server entry point lives in ./server and is not
 * re-exported, since importing it starts listening.
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp({ resources, images, blobs, media: config.media });
 * const res = await app.request('/api/resources/');
 * ```
 */

export { createApp, type AppOptions } from './app';

export {
  corsMiddleware,
  errorHandler,
  routeNotFoundHandler,
  loggerMiddleware,
  readBody,
  readValidatedBody,
} from './middleware';

export { createApiRouter, healthRoutes, mediaRoutes, type ApiInfo } from './routes';

export {
  serializeResource,
  serializeResources,
  serializeImage,
  absoluteUrl,
  resolveMediaBaseUrl,
  type ResourcePayload,
  type ImagePayload,
} from './serializers';

export {
  resourceFieldsSchema,
  imageUploadSchema,
  type ApiDependencies,
  type ApiError,
  type ApiErrorResponse,
} from './types';
