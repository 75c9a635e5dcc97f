import express from 'express';
import request from 'supertest';
import { OperationEntry, OperationLog } from '../application/operationLog.js';
import { AppConfig } from '../infra/config.js';
import { Db, IN_MEMORY, openDatabase } from '../infra/db/database.js';
import { runMigrations } from '../infra/db/migrate.js';
import { createApp } from '../infra/http/app.js';

export const TEST_SECRET = 'test-secret';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    jwtSecret: TEST_SECRET,
    accessTokenExpireMinutes: 30,
    databasePath: IN_MEMORY,
    operationLogPath: 'logs/test-operations.log',
    rateLimitMax: 1000,
    loginRateLimitMax: 1000,
    ...overrides,
  };
}

/**
 * Fresh in-memory database with the real migrations applied.
 */
export function createTestDb(): Db {
  const db = openDatabase(IN_MEMORY);
  runMigrations(db, { log: () => undefined });
  return db;
}

export class RecordingOperationLog implements OperationLog {
  readonly entries: OperationEntry[] = [];

  record(entry: OperationEntry): Promise<void> {
    this.entries.push(entry);
    return Promise.resolve();
  }
}

export interface TestApp {
  app: express.Application;
  db: Db;
  operationLog: RecordingOperationLog;
}

export function createTestApp(overrides: Partial<AppConfig> = {}): TestApp {
  const db = createTestDb();
  const operationLog = new RecordingOperationLog();
  const app = createApp({ config: testConfig(overrides), db, operationLog });
  return { app, db, operationLog };
}

export interface Session {
  token: string;
  userId: number;
}

export async function registerAndLogin(
  app: express.Application,
  username: string,
  password: string
): Promise<Session> {
  const registerRes = await request(app).post('/register').send({ username, password });
  if (registerRes.status !== 201) {
    throw new Error(`register ${username} failed with ${registerRes.status}`);
  }

  const loginRes = await request(app).post('/login').send({ username, password });
  if (loginRes.status !== 200) {
    throw new Error(`login ${username} failed with ${loginRes.status}`);
  }

  return { token: loginRes.body.token, userId: loginRes.body.userId };
}
