/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { openDatabase, runMigrations, LocalBlobStore } from '@/storage';
 */

export { openDatabase } from './db';
export type { AppDatabase, DatabaseConnection } from './db';
export { runMigrations, MIGRATIONS_FOLDER } from './migrator';

export { resources, resourceImages } from './schema';
export type { ResourceRow, NewResourceRow, ResourceImageRow, NewResourceImageRow } from './schema';

export * from './blobs';
export * from './repositories';
