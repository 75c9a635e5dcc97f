import { z } from 'zod';

export const DEFAULT_DATABASE_PATH = 'todos.db';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET environment variable is required' })
    .min(1, 'JWT_SECRET environment variable is required'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(30),
  DATABASE_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  OPERATION_LOG_PATH: z.string().min(1).default('logs/operations.log'),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(60),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
});

export interface AppConfig {
  port: number;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  databasePath: string;
  operationLogPath: string;
  /** Requests per minute per client across the API. */
  rateLimitMax: number;
  /** Login attempts per minute per IP. */
  loginRateLimitMax: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Read and validate configuration from environment variables.
 * Call dotenv.config() first to pick up a .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    jwtSecret: parsed.JWT_SECRET,
    accessTokenExpireMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    databasePath: parsed.DATABASE_PATH,
    operationLogPath: parsed.OPERATION_LOG_PATH,
    rateLimitMax: parsed.RATE_LIMIT_MAX,
    loginRateLimitMax: parsed.LOGIN_RATE_LIMIT_MAX,
  };
}
