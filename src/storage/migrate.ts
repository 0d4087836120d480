/**
 * Database Migration Script
 *
 * Applies pending migrations to the configured SQLite database.
 *
 * Usage:
 *   npm run db:migrate                                  # DATABASE_PATH or default
 *   DATABASE_PATH=/var/data/library.db npm run db:migrate
 */

import { config } from '../config';
import { openDatabase } from './db';
import { MIGRATIONS_FOLDER, runMigrations } from './migrator';

const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);
console.log(`[migrate] Migrations folder: ${MIGRATIONS_FOLDER}`);

const { sqlite } = openDatabase(dbPath);

try {
  const applied = runMigrations(sqlite);

  if (applied.length === 0) {
    console.log('[migrate] Database is up to date.');
  } else {
    for (const file of applied) {
      console.log(`[migrate] Applied ${file}`);
    }
    console.log('[migrate] Migrations completed successfully.');
  }

  const tables = sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' AND name != '__migrations' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }
} catch (error) {
  console.error('[migrate] Migration failed:', error);
  process.exitCode = 1;
} finally {
  sqlite.close();
}
