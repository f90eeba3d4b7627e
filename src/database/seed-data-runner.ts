import path from 'path';
import type Database from 'better-sqlite3';
import { applySqlFiles } from './sql-file-runner.js';

/**
 * Loads the example roster files in `seed-data/*.sql`, each at most once (tracked in `seed_data_applied`).
 * Run after migrations.
 */
export function runSeedData(db: Database.Database, seedDataPath?: string): string[] {
  return applySqlFiles(db, {
    label: 'seed data',
    directory: seedDataPath || path.join(process.cwd(), 'seed-data'),
    trackingTable: 'seed_data_applied',
    trackingColumn: 'name',
  });
}
