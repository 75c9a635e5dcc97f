import express from 'express';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { AuthenticateUseCase } from '../../application/auth/authenticate.js';
import { OperationLog } from '../../application/operationLog.js';
import { AppConfig } from '../config.js';
import { Db, ping } from '../db/database.js';
import { TodoRepo } from '../db/todoRepo.js';
import { UserRepo } from '../db/userRepo.js';
import { FileOperationLog } from '../log/fileOperationLog.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter, createLoginRateLimiter } from './middleware/rateLimit.js';
import { createAuthRoutes } from './routes/auth.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createTodoRoutes } from './routes/todos.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Same relative path from src/infra/http and dist/infra/http
export const PUBLIC_DIR = join(__dirname, '../../../web/public');

export interface AppDeps {
  config: AppConfig;
  db: Db;
  /** Defaults to a FileOperationLog at config.operationLogPath. */
  operationLog?: OperationLog;
}

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Health]
 *     summary: Database liveness
 *     responses:
 *       200: { description: Database reachable }
 *       500:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */
export function createApp(deps: AppDeps): express.Application {
  const { config, db } = deps;
  const operationLog = deps.operationLog ?? new FileOperationLog(config.operationLogPath);
  const userRepo = new UserRepo(db);
  const todoRepo = new TodoRepo(db);
  const authenticate = new AuthenticateUseCase(userRepo, config.jwtSecret);

  const app = express();

  app.use(express.json());
  app.use(createApiRateLimiter(config.rateLimitMax));

  // Web UI
  app.use(express.static(PUBLIC_DIR));

  app.get('/healthz', (_req, res) => {
    let healthy = false;
    try {
      healthy = ping(db);
    } catch (error) {
      console.error('Health check failed:', error);
    }

    if (healthy) {
      res.status(200).json({ status: 'ok' });
    } else {
      res.status(500).json({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
    }
  });

  app.use(createSwaggerRoutes());

  app.use(
    createAuthRoutes({
      userRepo,
      tokenSettings: {
        jwtSecret: config.jwtSecret,
        accessTokenExpireMinutes: config.accessTokenExpireMinutes,
      },
      loginRateLimiter: createLoginRateLimiter(config.loginRateLimitMax),
    })
  );

  app.use('/todos', createTodoRoutes({ todoRepo, operationLog, authenticate }));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
