/**
 * Presentation layer: domain records → response payloads.
 */

export { absoluteUrl, resolveMediaBaseUrl } from './urls';
export { serializeImage, type ImagePayload } from './image';
export { serializeResource, serializeResources, type ResourcePayload } from './resource';
