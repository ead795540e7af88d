import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from '../config';

export type DatabaseHandle = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS lookup_cache (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    ttl_ms INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS lookup_cache_counters (
    name TEXT PRIMARY KEY,
    value INTEGER NOT NULL DEFAULT 0
  );
`;

export function initSchema(db: DatabaseHandle): void {
  db.exec(SCHEMA);
}

/**
 * Open (or create) a database and make sure the schema exists.
 * Pass ':memory:' for a throwaway in-process database.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  initSchema(db);
  return db;
}

let sharedDb: DatabaseHandle | null = null;

/**
 * Shared handle on the configured DB_PATH, opened on first use.
 */
export function getDb(): DatabaseHandle {
  if (!sharedDb) {
    sharedDb = openDatabase(config.db.path);
  }
  return sharedDb;
}
