import 'dotenv/config';

import { openDatabase } from '../src/database/db.js';
import { getDatabasePath } from '../src/database/getDatabasePath.js';
import { runMigrations } from '../src/database/migration-runner.js';
import { runSeedData } from '../src/database/seed-data-runner.js';
import { Logger } from '../src/logger.js';

const logger = new Logger('SeedData');

/**
 * Applies pending migrations, then only the seed data files that haven't been applied yet.
 * Safe to run multiple times; both runners track what they applied.
 */
export function seedNewData(databasePath = process.env.DATABASE_PATH): string[] {
  const db = openDatabase(getDatabasePath(databasePath));
  try {
    logger.info('Starting incremental seed data process...');
    runMigrations(db);
    const applied = runSeedData(db);
    logger.info('Incremental seed data completed successfully', { applied });
    return applied;
  } catch (error) {
    logger.error('Error during incremental seed data:', error);
    throw error;
  } finally {
    db.close();
  }
}

// Allow running this script directly
if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    seedNewData();
    logger.info('Seed data script completed');
    process.exit(0);
  } catch (error) {
    logger.error('Seed data script failed:', error);
    process.exit(1);
  }
}
