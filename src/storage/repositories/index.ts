/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { ResourceRepository, ImageRepository } from '@/storage/repositories';
 *
 * const resourceRepo = new ResourceRepository(db, blobs);
 * const imageRepo = new ImageRepository(db, blobs);
 * ```
 */

export type { Repository, Clock, RepositoryOptions } from './base';
export { systemClock } from './base';

export {
  ResourceRepository,
  type ResourceFields,
  type CreateResourceInput,
  type UpdateResourceInput,
  type UpdateResourceOptions,
} from './resource.repository';

export { ImageRepository, mapImageToDomain, type CreateImageInput } from './image.repository';
