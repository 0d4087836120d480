/**
 * Image payloads.
 */

import type { ResourceImage } from '@/core/models';
import { absoluteUrl } from './urls';

export interface ImagePayload {
  id: number;
  /** Owning resource id */
  resource: number;
  /** Stored blob key */
  image: string;
  image_url: string | null;
  caption: string;
  uploaded_at: string;
}

export function serializeImage(image: ResourceImage, mediaBaseUrl: string): ImagePayload {
  return {
    id: image.id,
    resource: image.resourceId,
    image: image.image,
    image_url: absoluteUrl(mediaBaseUrl, image.image),
    caption: image.caption,
    uploaded_at: image.uploadedAt.toISOString(),
  };
}
