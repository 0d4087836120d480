/**
 * Resource Repository Implementation
 *
 * Data access for Resource entities, including their attached file blob and
 * the images they own. Handles:
 *
 * - tag normalization on every write
 * - storing the attached file once the row (and so its id) exists
 * - replacing or clearing the attached file on update
 * - cascading deletes to owned images and all related blobs
 *
 * Blob writes and row writes cannot share a transaction. Where one succeeds
 * and the other fails, the repository undoes the half that succeeded before
 * rethrowing.
 */

import { asc, desc, eq } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { resources, resourceImages } from '../schema';
import type { NewResourceRow, ResourceRow } from '../schema';
import type { BlobStore, UploadedFile } from '../blobs';
import { resourceFileKey } from '../blobs';
import type { Resource, ResourceImage } from '@/core/models';
import { FieldMessages, NotFoundError, ValidationError } from '@/core/errors';
import { normalizeTags } from '@/core/tags';
import { mapImageToDomain } from './image.repository';
import { systemClock, type Clock, type Repository, type RepositoryOptions } from './base';

/**
 * Writable resource fields.
 *
 * `undefined` means "not supplied". For `file`, `null` clears the current
 * attachment while `undefined` leaves it alone.
 */
export interface ResourceFields {
  title?: string | null;
  description?: string | null;
  tags?: string | null;
  file?: UploadedFile | null;
}

export type CreateResourceInput = ResourceFields;
export type UpdateResourceInput = ResourceFields;

export interface UpdateResourceOptions {
  /**
   * When true only supplied fields change (PATCH). When false the update
   * replaces the resource (PUT): title is required, and a missing
   * description or tags field is reset to its default. The file is left
   * alone when omitted in either mode.
   */
  partial: boolean;
}

/**
 * Validates and trims a title.
 *
 * @throws ValidationError if the title is missing, null or blank
 */
function requireTitle(title: string | null | undefined): string {
  if (title === undefined) {
    throw ValidationError.forField('title', FieldMessages.REQUIRED);
  }
  if (title === null) {
    throw ValidationError.forField('title', FieldMessages.NULL);
  }

  const trimmed = title.trim();
  if (trimmed === '') {
    throw ValidationError.forField('title', FieldMessages.BLANK);
  }

  return trimmed;
}

function cleanDescription(description: string | null | undefined): string | null {
  return description == null ? null : description.trim();
}

/**
 * Maps a database row plus its images to a Resource domain model.
 */
function mapToDomain(row: ResourceRow, images: ResourceImage[]): Resource {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    resourceFile: row.resourceFile,
    tags: row.tags,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    images,
  };
}

/**
 * Repository for Resource entity data access operations.
 *
 * @example
 * ```typescript
 * const repo = new ResourceRepository(db, new LocalBlobStore('./media'));
 *
 * const created = await repo.create({ title: 'Field Guide', tags: 'birds, , uk' });
 * created.tags; // 'birds, uk'
 *
 * await repo.update(created.id, { description: 'Pocket edition' }, { partial: true });
 * await repo.delete(created.id);
 * ```
 */
export class ResourceRepository
  implements Repository<Resource, CreateResourceInput, UpdateResourceInput>
{
  private readonly clock: Clock;

  constructor(
    private readonly db: AppDatabase,
    private readonly blobs: BlobStore,
    options: RepositoryOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Retrieves all resources, newest first, each with its images.
   * Resources created in the same millisecond are ordered by descending id.
   */
  async findAll(): Promise<Resource[]> {
    const rows = await this.db
      .select()
      .from(resources)
      .orderBy(desc(resources.createdAt), desc(resources.id));

    if (rows.length === 0) {
      return [];
    }

    // Every image belongs to some resource, so no filter is needed. Binding
    // the ids would run into SQLite's variable limit on large tables.
    const imageRows = await this.db
      .select()
      .from(resourceImages)
      .orderBy(asc(resourceImages.id));

    const imagesByResource = new Map<number, ResourceImage[]>();
    for (const imageRow of imageRows) {
      const list = imagesByResource.get(imageRow.resourceId) ?? [];
      list.push(mapImageToDomain(imageRow));
      imagesByResource.set(imageRow.resourceId, list);
    }

    return rows.map((row) => mapToDomain(row, imagesByResource.get(row.id) ?? []));
  }

  /**
   * Retrieves a resource by its ID, with its images.
   *
   * @returns The Resource if found, or null if not found
   */
  async findById(id: number): Promise<Resource | null> {
    const row = await this.findRow(id);
    if (!row) {
      return null;
    }

    return mapToDomain(row, await this.findImages(id));
  }

  /**
   * Retrieves a resource that must exist.
   *
   * @throws NotFoundError if the resource does not exist
   */
  async get(id: number): Promise<Resource> {
    const resource = await this.findById(id);
    if (!resource) {
      throw new NotFoundError('Resource', id);
    }
    return resource;
  }

  /**
   * Creates a resource, storing its attached file if one was supplied.
   *
   * The file's blob key contains the resource id, so the row is inserted
   * first and updated with the key once the blob is stored.
   *
   * @throws ValidationError if the title is missing or blank
   */
  async create(input: CreateResourceInput): Promise<Resource> {
    const title = requireTitle(input.title);
    const now = this.clock();

    const inserted = await this.db
      .insert(resources)
      .values({
        title,
        description: cleanDescription(input.description),
        tags: normalizeTags(input.tags),
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    let row = inserted[0];

    if (input.file) {
      row = await this.attachFileToNewRow(row, input.file);
    }

    return mapToDomain(row, []);
  }

  /**
   * Updates a resource.
   *
   * Supplying a file replaces the attachment; the previous blob is removed
   * only after the row points at the new one. Supplying `file: null` clears
   * the attachment and removes its blob.
   *
   * @throws NotFoundError if the resource does not exist
   * @throws ValidationError if a required or supplied title is blank
   */
  async update(
    id: number,
    input: UpdateResourceInput,
    options: UpdateResourceOptions = { partial: true }
  ): Promise<Resource> {
    const existing = await this.findRow(id);
    if (!existing) {
      throw new NotFoundError('Resource', id);
    }

    const changes: Partial<NewResourceRow> = {};

    if (!options.partial || input.title !== undefined) {
      changes.title = requireTitle(input.title);
    }

    if (input.description !== undefined) {
      changes.description = cleanDescription(input.description);
    } else if (!options.partial) {
      changes.description = null;
    }

    if (input.tags !== undefined) {
      changes.tags = normalizeTags(input.tags);
    } else if (!options.partial) {
      changes.tags = '';
    }

    let storedKey: string | null = null;
    if (input.file) {
      storedKey = await this.blobs.save(
        resourceFileKey(id, input.file.filename),
        input.file.content
      );
    }

    let written: { row: ResourceRow; staleKey: string | null } | null;
    try {
      // The current file is re-read inside the write so that concurrent
      // replacements each remove the key they actually displaced.
      written = this.db.transaction((tx) => {
        const current = tx
          .select({ resourceFile: resources.resourceFile, updatedAt: resources.updatedAt })
          .from(resources)
          .where(eq(resources.id, id))
          .get();
        if (!current) {
          return null;
        }

        const set: Partial<NewResourceRow> = {
          ...changes,
          updatedAt: this.nextUpdatedAt(current.updatedAt),
        };
        let staleKey: string | null = null;
        if (input.file !== undefined) {
          set.resourceFile = storedKey;
          staleKey = current.resourceFile;
        }

        const row = tx.update(resources).set(set).where(eq(resources.id, id)).returning().get();
        return row ? { row, staleKey } : null;
      });
    } catch (err) {
      if (storedKey) {
        await this.blobs.delete(storedKey);
      }
      throw err;
    }

    if (!written) {
      if (storedKey) {
        await this.blobs.delete(storedKey);
      }
      throw new NotFoundError('Resource', id);
    }

    const { row, staleKey } = written;
    if (staleKey && staleKey !== storedKey) {
      await this.blobs.delete(staleKey);
    }

    return mapToDomain(row, await this.findImages(id));
  }

  /**
   * Deletes a resource together with its images and every related blob.
   *
   * Image rows and the resource row are removed in one transaction; blobs
   * are removed afterwards so no surviving row ever points at a missing blob.
   *
   * @throws NotFoundError if the resource does not exist
   */
  async delete(id: number): Promise<void> {
    const existing = await this.findRow(id);
    if (!existing) {
      throw new NotFoundError('Resource', id);
    }

    const images = await this.findImages(id);

    // better-sqlite3 transactions are synchronous
    this.db.transaction((tx) => {
      tx.delete(resourceImages).where(eq(resourceImages.resourceId, id)).run();
      tx.delete(resources).where(eq(resources.id, id)).run();
    });

    const keys = images.map((image) => image.image);
    if (existing.resourceFile) {
      keys.push(existing.resourceFile);
    }

    await Promise.all(keys.map((key) => this.blobs.delete(key)));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async findRow(id: number): Promise<ResourceRow | null> {
    const result = await this.db
      .select()
      .from(resources)
      .where(eq(resources.id, id))
      .limit(1);

    return result.length === 0 ? null : result[0];
  }

  private async findImages(resourceId: number): Promise<ResourceImage[]> {
    const rows = await this.db
      .select()
      .from(resourceImages)
      .where(eq(resourceImages.resourceId, resourceId))
      .orderBy(asc(resourceImages.id));

    return rows.map(mapImageToDomain);
  }

  /**
   * Stores the file for a just-inserted row and records its key.
   * On failure the row (and blob, if written) are removed before rethrowing.
   */
  private async attachFileToNewRow(row: ResourceRow, file: UploadedFile): Promise<ResourceRow> {
    let key: string;

    try {
      key = await this.blobs.save(resourceFileKey(row.id, file.filename), file.content);
    } catch (err) {
      await this.db.delete(resources).where(eq(resources.id, row.id));
      throw err;
    }

    try {
      const updated = await this.db
        .update(resources)
        .set({ resourceFile: key })
        .where(eq(resources.id, row.id))
        .returning();

      return updated[0];
    } catch (err) {
      await this.blobs.delete(key);
      await this.db.delete(resources).where(eq(resources.id, row.id));
      throw err;
    }
  }

  /**
   * Timestamp for a mutation: the clock's time, or 1ms past the previous
   * value when the clock has not moved beyond it.
   */
  private nextUpdatedAt(previous: Date): Date {
    const now = this.clock();
    return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
  }
}
