import dotenv from 'dotenv';
import { ConfigError, loadConfig } from '../config.js';
import { openDatabase } from '../db/database.js';
import { runMigrations } from '../db/migrate.js';
import { createApp } from './app.js';

dotenv.config();

function start(): void {
  const config = loadConfig();
  const db = openDatabase(config.databasePath);
  runMigrations(db);

  const app = createApp({ config, db });

  const server = app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`API docs: http://localhost:${config.port}/docs`);
    console.log(`Database: ${config.databasePath}, operation log: ${config.operationLogPath}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  start();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Failed to start server:', error);
  }
  process.exit(1);
}
