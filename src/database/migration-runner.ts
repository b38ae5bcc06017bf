/**
 * Applies the SQL files in `migrations/` in file-name order, once each.
 * Works on any database handle so tests can migrate in-memory databases.
 */

import * as fs from 'fs';
import * as path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../logger.js';

const logger = new Logger('migration-runner');

/**
 * @param migrationsPath - Directory holding the `.sql` files (defaults to `migrations` in cwd)
 * @returns Versions applied by this run
 */
export function runMigrations(db: Database.Database, migrationsPath?: string): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const migrationsDir = migrationsPath || path.join(process.cwd(), 'migrations');
  const versions = fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .map((file) => path.basename(file, '.sql'));

  const alreadyApplied = new Set(
    (db.prepare('SELECT version FROM schema_migrations').all() as { version: string }[]).map((row) => row.version),
  );
  const pending = versions.filter((version) => !alreadyApplied.has(version));

  logger.debug(`${versions.length} migration(s) found, ${pending.length} pending`);

  const recordVersion = db.prepare('INSERT INTO schema_migrations (version) VALUES (?)');
  for (const version of pending) {
    const sql = fs.readFileSync(path.join(migrationsDir, `${version}.sql`), 'utf8');

    try {
      db.transaction(() => {
        db.exec(sql);
        recordVersion.run(version);
      })();
      logger.info(`Applied migration ${version}`);
    } catch (error) {
      logger.error(`Failed to apply migration ${version}`, error);
      throw error;
    }
  }

  return pending;
}
