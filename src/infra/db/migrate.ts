import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import type { Db } from './database.js';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

export interface MigrateOptions {
  dir?: string;
  log?: (message: string) => void;
}

function getMigrations(dir: string): Migration[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);
}

function ensureMigrationsTable(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

function getAppliedMigrations(db: Db): number[] {
  return db
    .prepare<[], { version: number }>('SELECT version FROM schema_migrations ORDER BY version')
    .all()
    .map((row) => row.version);
}

/**
 * Apply pending SQL migrations in version order, each in its own transaction.
 * Returns the versions applied by this call.
 */
export function runMigrations(db: Db, options: MigrateOptions = {}): number[] {
  const dir = options.dir ?? MIGRATIONS_DIR;
  const log = options.log ?? console.log;

  ensureMigrationsTable(db);
  const applied = getAppliedMigrations(db);
  const pending = getMigrations(dir).filter((m) => !applied.includes(m.version));

  const record = db.prepare<[number]>('INSERT INTO schema_migrations (version) VALUES (?)');

  for (const migration of pending) {
    const sql = readFileSync(join(dir, migration.filename), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      record.run(migration.version);
    })();
    log(`✓ Applied migration ${migration.version}: ${migration.filename}`);
  }

  return pending.map((m) => m.version);
}
