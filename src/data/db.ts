/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

export type DatabaseHandle = Database.Database;

export class PersistenceError extends Error {
  constructor(
    message: string,
    public operation: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/** Runs `fn` and rethrows any storage failure as a PersistenceError. */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof PersistenceError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new PersistenceError(`${operation} failed: ${message}`, operation, error);
  }
}

function runMigrations(database: DatabaseHandle): void {
  if (!existsSync(MIGRATIONS_DIR)) {
    throw new PersistenceError(`Migrations directory not found: ${MIGRATIONS_DIR}`, 'migrate');
  }

  const files = readdirSync(MIGRATIONS_DIR)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ files }, 'Running database migrations');

  for (const file of files) {
    database.exec(readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'));
  }
}

/**
 * Opens a database at `dbPath` (or `:memory:`) and applies every migration.
 * Migrations are idempotent, so reopening an existing file is safe.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  return guard('openDatabase', () => {
    const inMemory = dbPath === ':memory:';
    if (!inMemory) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    logger.info({ dbPath, isNew: inMemory || !existsSync(dbPath) }, 'Initializing database');

    const database = new Database(dbPath);
    if (!inMemory) {
      // WAL lets readers see committed scans while a writer is active
      database.pragma('journal_mode = WAL');
    }
    database.pragma('foreign_keys = ON');

    runMigrations(database);
    return database;
  });
}
