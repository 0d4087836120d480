/**
 * Database Schema Definitions
 *
 * Drizzle ORM table definitions for SQLite. The tables mirror the SQL in
 * src/storage/migrations/; keep the two in step when changing either.
 *
 * - resources: library entries with an optional attached file
 * - resource_images: images owned by a resource
 *
 * Timestamps are stored as milliseconds since epoch and surface as Date
 * objects through Drizzle's timestamp_ms mode. Blob columns hold storage
 * keys relative to the media root, never absolute paths or URLs.
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

/**
 * Resources Table
 *
 * `tags` holds the normalized comma-separated form ('a, b, c'); the list
 * form is derived on read and never stored.
 */
export const resources = sqliteTable(
  'resources',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    title: text('title').notNull(),

    description: text('description'),

    // Key of the attached file, e.g. 'resources/7/files/handout.pdf'
    resourceFile: text('resource_file'),

    tags: text('tags').notNull().default(''),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('resources_created_at_idx').on(table.createdAt)]
);

/**
 * Resource Images Table
 *
 * Rows are removed with their resource (ON DELETE CASCADE); the repository
 * also deletes them explicitly so it can remove their blobs.
 */
export const resourceImages = sqliteTable(
  'resource_images',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),

    resourceId: integer('resource_id')
      .notNull()
      .references(() => resources.id, { onDelete: 'cascade' }),

    // Key of the image blob, e.g. 'resources/7/images/cover.png'
    image: text('image').notNull(),

    caption: text('caption').notNull().default(''),

    uploadedAt: integer('uploaded_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('resource_images_resource_id_idx').on(table.resourceId)]
);

// ============================================================================
// Inferred Types
// ============================================================================

export type ResourceRow = typeof resources.$inferSelect;
export type NewResourceRow = typeof resources.$inferInsert;

export type ResourceImageRow = typeof resourceImages.$inferSelect;
export type NewResourceImageRow = typeof resourceImages.$inferInsert;
