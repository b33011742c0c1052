import Database from 'better-sqlite3';
import { getConfig } from './config';
import { TransientError } from './errors';
import { info, warn } from './logger';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL UNIQUE,
    full_name TEXT,
    hashed_password TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'member' CHECK (role IN ('member', 'librarian')),
    is_superuser INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS permission_overrides (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    permission TEXT NOT NULL,
    effect TEXT NOT NULL CHECK (effect IN ('allow', 'deny')),
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_permission_overrides_user ON permission_overrides(user_id);

  CREATE TABLE IF NOT EXISTS books (
    id TEXT PRIMARY KEY,
    isbn TEXT NOT NULL CHECK (length(isbn) <= 20),
    title TEXT NOT NULL,
    author TEXT NOT NULL,
    is_available INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_books_isbn ON books(isbn);

  CREATE TABLE IF NOT EXISTS borrow_records (
    id TEXT PRIMARY KEY,
    book_id TEXT NOT NULL REFERENCES books(id),
    borrower_id TEXT NOT NULL REFERENCES users(id),
    borrowed_at TEXT NOT NULL,
    returned_at TEXT
  );

  -- One active loan per copy, enforced by the store.
  CREATE UNIQUE INDEX IF NOT EXISTS uq_borrow_records_active_book
    ON borrow_records(book_id) WHERE returned_at IS NULL;

  CREATE INDEX IF NOT EXISTS idx_borrow_records_borrower ON borrow_records(borrower_id);
`;

export type DatabaseOptions = {
  file: string;
  busyTimeoutMs: number;
};

let connection: Database.Database | null = null;

/**
 * Opens the SQLite database and applies the schema.
 * Any previously opened connection is closed first.
 * @param options File path and busy timeout; defaults come from config.
 * @returns Open database handle.
 */
export function initDatabase(options?: Partial<DatabaseOptions>): Database.Database {
  const config = getConfig();
  const file = options?.file ?? config.databaseUrl;
  const busyTimeoutMs = options?.busyTimeoutMs ?? config.dbBusyTimeoutMs;

  closeDatabase();

  const db = new Database(file, { timeout: busyTimeoutMs });
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  connection = db;
  info('Database ready', { file, busyTimeoutMs });
  return db;
}

/**
 * Returns the shared connection, opening it on first use.
 * @returns Open database handle.
 */
export function getDb(): Database.Database {
  return connection ?? initDatabase();
}

/**
 * Closes the shared connection if one is open.
 * @returns void
 */
export function closeDatabase(): void {
  if (connection) {
    connection.close();
    connection = null;
    info('Database closed');
  }
}

/**
 * Checks whether an error is SQLite reporting a held lock.
 * @param err Thrown value.
 * @returns True for SQLITE_BUSY and its extended codes.
 */
export function isBusyError(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code.startsWith('SQLITE_BUSY');
}

/**
 * Checks whether an error is a UNIQUE constraint violation.
 * @param err Thrown value.
 * @returns True when SQLite rejected a duplicate key.
 */
export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Runs work inside a BEGIN IMMEDIATE transaction. The write lock is taken
 * before the first read, so concurrent writers are serialized and every
 * check inside `work` sees the state it then mutates.
 *
 * A busy lock is retried once with the same work; a second failure surfaces
 * as a TransientError.
 * @param label Operation name used in logs.
 * @param work Synchronous unit of reads and writes.
 * @returns Whatever `work` returns.
 * @throws {TransientError} When the lock stays held past the busy timeout twice.
 */
export function atomically<T>(label: string, work: () => T): T {
  const run = getDb().transaction(work);
  try {
    return run.immediate();
  } catch (err) {
    if (!isBusyError(err)) {
      throw err;
    }
    warn(`Store busy during ${label}, retrying once`);
  }

  try {
    return run.immediate();
  } catch (err) {
    if (isBusyError(err)) {
      throw new TransientError(`Store is busy, ${label} could not complete; retry later`);
    }
    throw err;
  }
}
