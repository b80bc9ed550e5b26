import Database from 'better-sqlite3';
import { createAppError } from '../../errors.js';
import { metricsRegistry } from '../../observability/metrics.js';
import type { AppError } from '../../types.js';

const SQLITE_BUSY_RETRYABLE = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);
const sleepCell = new Int32Array(new SharedArrayBuffer(4));

export interface SqliteContext {
  db: Database.Database;
  close: () => void;
}

export function createSqliteContext(filePath: string): SqliteContext {
  const db = new Database(filePath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 2500');

  return {
    db,
    close: () => db.close()
  };
}

export function sqliteErrorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function toAppError(error: unknown, message: string): AppError {
  return createAppError(message, {
    statusCode: 503,
    code: 'DB_LOCK_TIMEOUT',
    recoverable: true,
    context: {
      cause: error instanceof Error ? error.message : String(error),
      action: 'retry_request'
    }
  });
}

export function withSqliteRetry<T>(fn: () => T, retries = 4): T {
  let attempt = 0;
  let lockWaitMs = 0;

  while (attempt <= retries) {
    try {
      const value = fn();
      if (lockWaitMs > 0) {
        metricsRegistry.observeSqliteWriteLockWait(lockWaitMs);
      }
      return value;
    } catch (error) {
      const code = sqliteErrorCode(error);
      if (!code || !SQLITE_BUSY_RETRYABLE.has(code)) {
        throw error;
      }

      if (attempt === retries) {
        throw toAppError(error, 'Database is temporarily busy; retry shortly.');
      }

      const delayMs = 25 * Math.pow(2, attempt);
      Atomics.wait(sleepCell, 0, 0, delayMs);
      lockWaitMs += delayMs;
      attempt += 1;
    }
  }

  throw toAppError(new Error('SQLite retry failed'), 'Database lock retry failed.');
}

export function inTransaction<T>(db: Database.Database, fn: () => T): T {
  db.exec('BEGIN IMMEDIATE');
  try {
    const value = fn();
    db.exec('COMMIT');
    return value;
  } catch (error) {
    db.exec('ROLLBACK');
    throw error;
  }
}
