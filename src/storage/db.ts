/**
 * Database Connection Factory
 *
 * Opens SQLite databases through better-sqlite3 and wraps them with Drizzle
 * ORM. Foreign key enforcement is switched on for every connection so the
 * resource_images → resources reference (and its ON DELETE CASCADE) holds.
 *
 * Usage:
 *   import { openDatabase } from '@/storage/db';
 *
 *   const { db, sqlite } = openDatabase(config.database.path);
 *   // ...
 *   sqlite.close();
 *
 *   // In-memory database for tests
 *   const testConnection = openDatabase(':memory:');
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/**
 * Type alias for the Drizzle database instance.
 *
 * Use this type when passing the database to repositories or helpers.
 */
export type AppDatabase = BetterSQLite3Database<typeof schema>;

/**
 * An open database: the Drizzle wrapper for queries and the raw connection
 * for pragmas, migrations and closing.
 */
export interface DatabaseConnection {
  db: AppDatabase;
  sqlite: Database.Database;
}

/**
 * Opens (or creates) the SQLite database at `dbPath`.
 *
 * @param dbPath - Path to the database file, or ':memory:'
 * @returns The Drizzle instance together with its raw connection
 *
 * @example
 * const { db } = openDatabase('/var/data/resource-library.db');
 */
export function openDatabase(dbPath: string = 'resource-library.db'): DatabaseConnection {
  const sqlite = new Database(dbPath);

  // SQLite ships with foreign keys disabled for backwards compatibility
  sqlite.pragma('foreign_keys = ON');

  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  return { db: drizzle(sqlite, { schema }), sqlite };
}
