import Database from 'better-sqlite3';

/** Storage failure surfaced to callers instead of a raw driver error. */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/**
 * Runs `fn` inside a single SQLite transaction.
 * Driver errors are rethrown as `PersistenceError`; domain errors thrown by `fn` roll back and pass through untouched.
 */
export function runInTransaction<T>(db: Database.Database, operation: string, fn: () => T): T {
  try {
    return db.transaction(fn)();
  } catch (error) {
    throw toPersistenceError(error, operation);
  }
}

/** Same wrapping for single statements that don't need a transaction. */
export function runStatement<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toPersistenceError(error, operation);
  }
}

function toPersistenceError(error: unknown, operation: string): unknown {
  if (error instanceof Database.SqliteError) {
    return new PersistenceError(`Database error during ${operation}: ${error.message}`, operation, { cause: error });
  }
  return error;
}
