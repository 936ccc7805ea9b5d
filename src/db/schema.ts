import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';

let db: DatabaseType | null = null;

const CREATE_NOTES = `
CREATE TABLE IF NOT EXISTS notes (
  key TEXT PRIMARY KEY,
  body TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

const CREATE_EMBEDDINGS = `
CREATE TABLE IF NOT EXISTS note_embeddings (
  key TEXT PRIMARY KEY REFERENCES notes(key) ON DELETE CASCADE,
  embedding BLOB NOT NULL
);
`;

const CREATE_EMBEDDING_METADATA = `
CREATE TABLE IF NOT EXISTS embedding_metadata (
  key TEXT PRIMARY KEY REFERENCES notes(key) ON DELETE CASCADE,
  provider TEXT NOT NULL,
  model TEXT NOT NULL,
  dimensions INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

const CREATE_FILES = `
CREATE TABLE IF NOT EXISTS files (
  name TEXT PRIMARY KEY,
  mime_type TEXT NOT NULL,
  tags TEXT NOT NULL DEFAULT '[]',
  size_bytes INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);
`;

// Databases created before foreign keys were declared can hold embeddings
// whose note is gone.
const PURGE_ORPHANED_EMBEDDINGS = `
DELETE FROM note_embeddings WHERE key NOT IN (SELECT key FROM notes);
DELETE FROM embedding_metadata WHERE key NOT IN (SELECT key FROM notes);
`;

export function initDatabase(dbPath: string): void {
  if (db) {
    db.close();
    db = null;
  }

  db = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(CREATE_NOTES);
  db.exec(CREATE_EMBEDDINGS);
  db.exec(CREATE_EMBEDDING_METADATA);
  db.exec(CREATE_FILES);
  db.exec(PURGE_ORPHANED_EMBEDDINGS);
}

export function getDatabase(): DatabaseType {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/** Run `fn` inside a single SQLite transaction; it rolls back if `fn` throws. */
export function withTransaction<T>(fn: () => T): T {
  return getDatabase().transaction(fn)();
}
