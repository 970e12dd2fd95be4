/**
 * Database manager for the qa-store SQLite databases.
 * Provides one connection per database file and transaction support.
 */

import Database from 'better-sqlite3';
import { dirname, resolve } from 'path';
import { ensureDirSync } from '../../utils/file-system.js';

/** SQLite cache size in KB (negative means KB, positive means pages) */
const CACHE_SIZE_KB = -16000; // 16MB

const IN_MEMORY = ':memory:';

/** Database connections by resolved file path */
const connections = new Map<string, Database.Database>();

export type SchemaInitializer = (db: Database.Database) => void;

/**
 * Apply connection settings.
 * synchronous = FULL: a write is on disk before the statement returns.
 */
function configure(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = FULL');
  db.pragma(`cache_size = ${CACHE_SIZE_KB}`);
  db.pragma('temp_store = MEMORY');
}

/**
 * Open a database without registering it. ':memory:' gives a private
 * in-memory database.
 */
export function openDb(dbPath: string, initialize: SchemaInitializer): Database.Database {
  if (dbPath !== IN_MEMORY) {
    ensureDirSync(dirname(dbPath));
  }

  const db = new Database(dbPath);
  configure(db);
  initialize(db);
  return db;
}

/**
 * Get or create the shared connection for a database file.
 */
export function getDb(dbPath: string, initialize: SchemaInitializer): Database.Database {
  const key = dbPath === IN_MEMORY ? dbPath : resolve(dbPath);
  const existing = connections.get(key);
  if (existing && existing.open) {
    return existing;
  }

  const db = openDb(dbPath, initialize);
  if (key !== IN_MEMORY) {
    connections.set(key, db);
  }
  return db;
}

/**
 * Close the shared connection for a database file.
 */
export function closeDb(dbPath: string): void {
  const key = resolve(dbPath);
  const db = connections.get(key);
  if (db) {
    db.close();
    connections.delete(key);
  }
}

/**
 * Run a function within a database transaction.
 * Automatically commits on success, rolls back on error.
 */
export function transaction<T>(
  db: Database.Database,
  fn: () => T
): T {
  return db.transaction(fn)();
}
