import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export type Db = Database.Database;

export const IN_MEMORY = ':memory:';

/**
 * Open the SQLite database file, creating its directory if needed.
 * The handle lives for the whole process and is passed to repositories.
 */
export function openDatabase(path: string): Db {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  return db;
}

/**
 * Liveness probe used by the health check.
 */
export function ping(db: Db): boolean {
  const row = db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
  return row?.ok === 1;
}
