/**
 * Database schema definitions for the question tree and the vector store.
 * Handles schema creation and migrations.
 */

import type Database from 'better-sqlite3';

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Question tree: one row per question, parent links only.
 * Children, depth and subtree size are derived, never stored.
 */
export const TREE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS questions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  question TEXT NOT NULL CHECK (length(trim(question)) > 0),
  answer TEXT,
  parent_id INTEGER,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (parent_id) REFERENCES questions(id)
);

CREATE INDEX IF NOT EXISTS idx_questions_parent ON questions(parent_id);
CREATE INDEX IF NOT EXISTS idx_questions_answered ON questions(answer IS NULL);

CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT
);
`;

/**
 * Vector store: named collections of documents with JSON metadata and
 * JSON-encoded embeddings.
 */
export const VECTOR_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS collections (
  name TEXT PRIMARY KEY,
  created_at TEXT DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS documents (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  collection TEXT NOT NULL,
  id TEXT NOT NULL,
  document TEXT NOT NULL,
  metadata TEXT NOT NULL,
  embedding TEXT NOT NULL,
  FOREIGN KEY (collection) REFERENCES collections(name) ON DELETE CASCADE,
  UNIQUE(collection, id)
);

CREATE INDEX IF NOT EXISTS idx_documents_collection ON documents(collection);

CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT
);
`;

function initialize(db: Database.Database, sql: string): void {
  db.pragma('foreign_keys = ON');

  // db.exec() is SQLite's exec method for running SQL, not child_process.exec()
  db.exec(sql);

  db.prepare('INSERT OR IGNORE INTO meta (key, value) VALUES (?, ?)')
    .run('schema_version', String(SCHEMA_VERSION));
}

/**
 * Initialize the question tree schema.
 */
export function initializeTreeSchema(db: Database.Database): void {
  initialize(db, TREE_SCHEMA_SQL);
}

/**
 * Initialize the vector store schema.
 */
export function initializeVectorSchema(db: Database.Database): void {
  initialize(db, VECTOR_SCHEMA_SQL);
}
