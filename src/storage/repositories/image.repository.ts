/**
 * ResourceImage Repository Implementation
 *
 * Data access for images owned by a resource. An image row and its blob are
 * created together and deleted together; the blob key is derived from the
 * owning resource's id.
 */

import { asc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { resources, resourceImages } from '../schema';
import type { BlobStore, UploadedFile } from '../blobs';
import { resourceImageKey } from '../blobs';
import type { ResourceImage } from '@/core/models';
import { FieldMessages, NotFoundError, ValidationError } from '@/core/errors';
import { systemClock, type Clock, type RepositoryOptions } from './base';

/**
 * Input type for uploading an image.
 */
export interface CreateImageInput {
  /** Resource that will own the image */
  resourceId: number;
  /** Image payload; missing payloads are rejected */
  image?: UploadedFile | null;
  /** Optional caption, stored as '' when absent */
  caption?: string | null;
}

/**
 * Maps a database row to a ResourceImage domain model.
 */
export function mapImageToDomain(row: typeof resourceImages.$inferSelect): ResourceImage {
  return {
    id: row.id,
    resourceId: row.resourceId,
    image: row.image,
    caption: row.caption,
    uploadedAt: row.uploadedAt,
  };
}

/**
 * Repository for ResourceImage data access operations.
 *
 * @example
 * ```typescript
 * const images = new ImageRepository(db, blobs);
 *
 * const image = await images.create({
 *   resourceId: 4,
 *   image: { filename: 'cover.png', content: bytes },
 *   caption: 'Front cover',
 * });
 *
 * await images.delete(image.id);
 * ```
 */
export class ImageRepository {
  private readonly clock: Clock;

  constructor(
    private readonly db: AppDatabase,
    private readonly blobs: BlobStore,
    options: RepositoryOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Finds a single image by its ID.
   *
   * @returns The image if found, or null if not found
   */
  async findById(id: number): Promise<ResourceImage | null> {
    const result = await this.db
      .select()
      .from(resourceImages)
      .where(eq(resourceImages.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapImageToDomain(result[0]);
  }

  /**
   * Finds all images owned by a resource, oldest first.
   */
  async findByResourceId(resourceId: number): Promise<ResourceImage[]> {
    const results = await this.db
      .select()
      .from(resourceImages)
      .where(eq(resourceImages.resourceId, resourceId))
      .orderBy(asc(resourceImages.id));

    return results.map(mapImageToDomain);
  }

  /**
   * Stores an uploaded image and records it against its resource.
   *
   * The resource is checked first, so an upload to a missing resource is a
   * NotFoundError whatever the payload. If the row cannot be written the
   * stored blob is removed again.
   *
   * @throws NotFoundError if the resource does not exist
   * @throws ValidationError if no image payload was supplied
   */
  async create(input: CreateImageInput): Promise<ResourceImage> {
    const owner = await this.db
      .select({ id: resources.id })
      .from(resources)
      .where(eq(resources.id, input.resourceId))
      .limit(1);

    if (owner.length === 0) {
      throw new NotFoundError('Resource', input.resourceId);
    }

    if (!input.image) {
      throw ValidationError.forField('image', FieldMessages.IMAGE_REQUIRED);
    }

    const key = await this.blobs.save(
      resourceImageKey(input.resourceId, input.image.filename),
      input.image.content
    );

    try {
      const result = await this.db
        .insert(resourceImages)
        .values({
          resourceId: input.resourceId,
          image: key,
          caption: input.caption ?? '',
          uploadedAt: this.clock(),
        })
        .returning();

      return mapImageToDomain(result[0]);
    } catch (err) {
      await this.blobs.delete(key);
      throw err;
    }
  }

  /**
   * Deletes an image row and its blob.
   *
   * @throws NotFoundError if the image does not exist
   */
  async delete(id: number): Promise<void> {
    const result = await this.db
      .delete(resourceImages)
      .where(eq(resourceImages.id, id))
      .returning({ image: resourceImages.image });

    if (result.length === 0) {
      throw new NotFoundError('ResourceImage', id);
    }

    await this.blobs.delete(result[0].image);
  }
}
