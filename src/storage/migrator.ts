/**
 * SQL Migration Runner
 *
 * Applies the numbered `.sql` files in src/storage/migrations/ in filename
 * order. Each file runs once, inside its own transaction, and is recorded in
 * the `__migrations` table so repeated runs only apply new files.
 */

import type Database from 'better-sqlite3';
import { readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Folder holding the bundled migration files */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL('./migrations', import.meta.url));

/**
 * Runs all pending migrations against an open connection.
 *
 * @param sqlite - Raw better-sqlite3 connection
 * @param migrationsFolder - Folder to read `.sql` files from
 * @returns Names of the files applied by this call (empty when up to date)
 */
export function runMigrations(
  sqlite: Database.Database,
  migrationsFolder: string = MIGRATIONS_FOLDER
): string[] {
  sqlite.exec(
    'CREATE TABLE IF NOT EXISTS `__migrations` (`name` text PRIMARY KEY NOT NULL, `applied_at` integer NOT NULL)'
  );

  const applied = new Set(
    sqlite
      .prepare<[], { name: string }>('SELECT name FROM `__migrations`')
      .all()
      .map((row) => row.name)
  );

  const pending = readdirSync(migrationsFolder)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort();

  const record = sqlite.prepare<[string, number]>(
    'INSERT INTO `__migrations` (`name`, `applied_at`) VALUES (?, ?)'
  );

  for (const file of pending) {
    const statements = readFileSync(join(migrationsFolder, file), 'utf8');

    sqlite.transaction(() => {
      sqlite.exec(statements);
      record.run(file, Date.now());
    })();
  }

  return pending;
}
