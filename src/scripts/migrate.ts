import dotenv from 'dotenv';
import { DEFAULT_DATABASE_PATH } from '../infra/config.js';
import { openDatabase } from '../infra/db/database.js';
import { runMigrations } from '../infra/db/migrate.js';

dotenv.config();

const databasePath = process.env.DATABASE_PATH || DEFAULT_DATABASE_PATH;

console.log(`Starting migrations on ${databasePath}...`);

const db = openDatabase(databasePath);
try {
  const applied = runMigrations(db);
  console.log(
    applied.length === 0
      ? 'No pending migrations.'
      : `Applied ${applied.length} migration(s) successfully.`
  );
} catch (error) {
  console.error('Migration failed:', error);
  process.exitCode = 1;
} finally {
  db.close();
}
