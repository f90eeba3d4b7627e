import * as path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../logger.js';
import { applySqlFiles } from './sql-file-runner.js';

const logger = new Logger('migration-runner');

/**
 * Brings the schema up to date from `migrations/*.sql`, tracked in `schema_migrations`.
 * Works on any handle: the application database or an in-memory one in tests.
 * @param migrationsPath - defaults to `migrations` in the current working directory
 * @returns the versions applied by this call
 */
export function runMigrations(db: Database.Database, migrationsPath?: string): string[] {
  const applied = applySqlFiles(db, {
    label: 'migration',
    directory: migrationsPath || path.join(process.cwd(), 'migrations'),
    trackingTable: 'schema_migrations',
    trackingColumn: 'version',
  });
  if (applied.length > 0) {
    logger.info(`Schema migrated to ${applied[applied.length - 1]}`, { applied });
  }
  return applied;
}
