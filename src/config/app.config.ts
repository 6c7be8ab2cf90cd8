/** App configuration, read from the environment (see .env.example). */
import { z } from 'zod';
import { ConfigError } from '@/utils/errors';
import { toIssues } from '@/utils/validation';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),

  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_POLL_TIMEOUT_SEC: z.coerce.number().int().min(0).max(300).default(60),
  TELEGRAM_DEBUG: booleanFlag,

  OPENWEATHERMAP_API_TOKEN: z.string().min(1, 'OPENWEATHERMAP_API_TOKEN is required'),
  OPENWEATHERMAP_URL: z.string().url().default('https://api.openweathermap.org/data/2.5/weather'),
  FORECAST_TIMEOUT_MS: z.coerce.number().int().positive().default(1000),
  FORECAST_QUEUE_SIZE: z.coerce.number().int().positive().default(100),

  DB_DSN: z.string().min(1, 'DB_DSN is required'),
  DB_MAX_CONNS: z.coerce.number().int().positive().default(5),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MIGRATIONS_DIR: z.string().min(1).default('migrations'),

  LOG_LEVEL: z.enum(['silly', 'trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json', 'hidden']).default('pretty'),

  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
});

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Validates the environment and shapes it into the config the components take.
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }
  const e = result.data;

  return {
    nodeEnv: e.NODE_ENV,
    telegram: {
      token: e.TELEGRAM_BOT_TOKEN,
      apiUrl: e.TELEGRAM_API_URL,
      pollTimeoutSec: e.TELEGRAM_POLL_TIMEOUT_SEC,
      debug: e.TELEGRAM_DEBUG,
    },
    forecast: {
      apiToken: e.OPENWEATHERMAP_API_TOKEN,
      endpoint: e.OPENWEATHERMAP_URL,
      timeoutMs: e.FORECAST_TIMEOUT_MS,
      maxQueueSize: e.FORECAST_QUEUE_SIZE,
    },
    db: {
      dsn: e.DB_DSN,
      maxConns: e.DB_MAX_CONNS,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
      migrationsDir: e.MIGRATIONS_DIR,
    },
    log: {
      level: e.LOG_LEVEL,
      format: e.LOG_FORMAT,
    },
    health: {
      port: e.HEALTH_PORT,
    },
  };
}
