import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { Logger } from '../logger.js';

const logger = new Logger('db');

/**
 * Opens (creating if needed) the SQLite database used by every store.
 * WAL journaling and foreign keys are always on; the notification log relies on `ON DELETE SET NULL`.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    logger.info(`Connecting to database at ${dbPath}`);
    if (!fs.existsSync(dbPath)) {
      logger.info('Database file does not exist, creating...');
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      fs.writeFileSync(dbPath, '');
      logger.info(`Database file created at ${dbPath}`);
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  return db;
}
