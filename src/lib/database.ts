import { AsyncLocalStorage } from 'node:async_hooks';
import Database from 'better-sqlite3';
import { SCHEMA, TABLES } from './schema';

let db: Database.Database | null = null;

/**
 * Initialize the database connection and apply the schema.
 * Pass ':memory:' for an in-process database.
 */
export function initDatabase(path = 'attendance.db'): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(path);
  // WAL lets report reads proceed while a sync is writing
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 30000');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

/**
 * Get the database instance.
 * Throws if database is not initialized.
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Close the database connection.
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Execute a SQL query that doesn't return results (INSERT, UPDATE, DELETE).
 * Outside a transaction the write waits its turn behind any transaction in
 * flight, so it can never land inside another caller's savepoint.
 * Retries on "database is locked" errors.
 */
export async function execute(
  query: string,
  bindValues: unknown[] = []
): Promise<{ rowsAffected: number; lastInsertId: number }> {
  if (transactionScope.getStore() !== undefined) {
    return runStatement(query, bindValues);
  }
  return enqueueWrite(() => runStatement(query, bindValues));
}

async function runStatement(
  query: string,
  bindValues: unknown[]
): Promise<{ rowsAffected: number; lastInsertId: number }> {
  const database = getDatabase();
  return retryOnLock(() => {
    const result = database.prepare(query).run(...bindValues);
    return {
      rowsAffected: result.changes,
      lastInsertId: Number(result.lastInsertRowid),
    };
  });
}

/**
 * Execute a SQL query that returns results (SELECT).
 */
export async function select<T>(
  query: string,
  bindValues: unknown[] = []
): Promise<T[]> {
  const database = getDatabase();
  return retryOnLock(() => database.prepare<unknown[], T>(query).all(...bindValues));
}

/**
 * Retry a database operation if it fails with SQLITE_BUSY / "database is locked".
 * Uses exponential backoff with jitter.
 */
async function retryOnLock<T>(fn: () => T, maxRetries = 5): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return fn();
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      const isLocked = msg.includes('database is locked') || msg.includes('SQLITE_BUSY');
      if (!isLocked || attempt >= maxRetries) {
        throw error;
      }
      // 100ms, 200ms, 400ms, 800ms, 1600ms + jitter
      const delay = Math.min(100 * Math.pow(2, attempt), 2000) + Math.random() * 100;
      console.warn(`[database] Locked, retrying in ${Math.round(delay)}ms (attempt ${attempt + 1}/${maxRetries})`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

// Writes share one connection, so transactions and stand-alone writes run one at a time.
let writeQueue: Promise<void> = Promise.resolve();
let savepointCounter = 0;
// Name of the savepoint the current async call chain runs inside
const transactionScope = new AsyncLocalStorage<string>();

function enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
  const result = writeQueue.then(task, task);
  writeQueue = result.then(() => undefined, () => undefined);
  return result;
}

/**
 * Run `fn` inside a savepoint, queued behind any write already in flight.
 * Rolls back and rethrows if `fn` throws. Not re-entrant: calling it from
 * inside another withTransaction callback rejects.
 */
export function withTransaction<T>(fn: () => Promise<T>): Promise<T> {
  const outer = transactionScope.getStore();
  if (outer !== undefined) {
    return Promise.reject(new Error(`withTransaction called inside ${outer}`));
  }

  const run = async (): Promise<T> => {
    savepointCounter += 1;
    const savepointName = `tx_${savepointCounter}`;
    return transactionScope.run(savepointName, async () => {
      await execute(`SAVEPOINT ${savepointName}`);
      try {
        const result = await fn();
        await execute(`RELEASE SAVEPOINT ${savepointName}`);
        return result;
      } catch (error) {
        try {
          await execute(`ROLLBACK TO SAVEPOINT ${savepointName}`);
          await execute(`RELEASE SAVEPOINT ${savepointName}`);
        } catch (rollbackError) {
          console.error(`[database] Rollback of ${savepointName} failed:`, rollbackError);
        }
        throw error;
      }
    });
  };

  return enqueueWrite(run);
}

/**
 * Yield to the event loop so long-running batches don't starve other work.
 */
export function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Delete all rows from every table, keeping the schema.
 */
export function flushDatabase(): void {
  const database = getDatabase();
  for (const table of TABLES) {
    database.exec(`DELETE FROM ${table}`);
  }
}
