import * as fs from 'fs';
import * as path from 'path';
import type Database from 'better-sqlite3';
import { Logger } from '../logger.js';
import { runInTransaction } from './persistence.js';

const logger = new Logger('sql-file-runner');

export interface SqlFileSet {
  /** Used in log lines and transaction names, e.g. `migration`. */
  label: string;
  directory: string;
  /** Table recording which files have run; created on first use. */
  trackingTable: 'schema_migrations' | 'seed_data_applied';
  trackingColumn: 'version' | 'name';
}

/** `.sql` files of a directory, by file name. */
export function listSqlFiles(directory: string): string[] {
  return fs
    .readdirSync(directory)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Runs every file of the set that is not recorded yet. Each file and its tracking row commit together,
 * so a failing file leaves no trace and stops the run.
 * @returns names (file names without `.sql`) applied by this call
 */
export function applySqlFiles(db: Database.Database, set: SqlFileSet): string[] {
  const { label, directory, trackingTable, trackingColumn } = set;
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${trackingTable} (
      ${trackingColumn} TEXT PRIMARY KEY,
      applied_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const files = listSqlFiles(directory);
  const applied = new Set(
    (db.prepare(`SELECT ${trackingColumn} AS name FROM ${trackingTable}`).all() as { name: string }[]).map(
      (row) => row.name,
    ),
  );
  logger.debug(`Found ${files.length} ${label} file(s) in ${directory}`, { alreadyApplied: applied.size });

  const appliedNow: string[] = [];
  for (const file of files) {
    const name = path.basename(file, '.sql');
    if (applied.has(name)) {
      continue;
    }

    logger.info(`Applying ${label}: ${file}`);
    const sql = fs.readFileSync(path.join(directory, file), 'utf8');
    try {
      runInTransaction(db, `${label} ${name}`, () => {
        db.exec(sql);
        db.prepare(`INSERT INTO ${trackingTable} (${trackingColumn}) VALUES (?)`).run(name);
      });
    } catch (error) {
      logger.error(`✗ Failed to apply ${file}:`, error);
      throw error;
    }
    appliedNow.push(name);
  }

  return appliedNow;
}
