/**
 * Resource payloads.
 *
 * Field names are snake_case and timestamps ISO 8601 strings, the shape the
 * frontend client reads. `tags` is the stored normalized string and
 * `tags_list` its decoded form.
 */

import type { Resource } from '@/core/models';
import { decodeTags } from '@/core/tags';
import { serializeImage, type ImagePayload } from './image';
import { absoluteUrl } from './urls';

export interface ResourcePayload {
  id: number;
  title: string;
  description: string | null;
  /** Stored blob key of the attached file */
  resource_file: string | null;
  resource_file_url: string | null;
  tags: string;
  tags_list: string[];
  images: ImagePayload[];
  created_at: string;
  updated_at: string;
}

export function serializeResource(resource: Resource, mediaBaseUrl: string): ResourcePayload {
  return {
    id: resource.id,
    title: resource.title,
    description: resource.description,
    resource_file: resource.resourceFile,
    resource_file_url: absoluteUrl(mediaBaseUrl, resource.resourceFile),
    tags: resource.tags,
    tags_list: decodeTags(resource.tags),
    images: resource.images.map((image) => serializeImage(image, mediaBaseUrl)),
    created_at: resource.createdAt.toISOString(),
    updated_at: resource.updatedAt.toISOString(),
  };
}

export function serializeResources(list: Resource[], mediaBaseUrl: string): ResourcePayload[] {
  return list.map((resource) => serializeResource(resource, mediaBaseUrl));
}
