// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import type { Server } from 'http';
import { CommandDispatcher } from '@/bot/dispatcher';
import { TelegramTransport } from '@/bot/telegram';
import { loadConfig } from '@/config/app.config';
import { PgConnector } from '@/db/connection';
import { runMigrations } from '@/db/migrate';
import { createHealthApp } from '@/routes/health';
import { createLogger } from '@/services/logger';
import { ForecastStore } from '@/services/storage/forecast-store';
import { ForecastClient } from '@/services/weather/forecast-client';
import { ForecastPipeline } from '@/services/weather/forecast-pipeline';
import {
  createShutdownHandler,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';
import { errorMessage } from '@/utils/errors';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.log.level, format: config.log.format });

  const shutdown = createShutdownHandler({ logger, controller: new AbortController() });
  setupUnhandledRejectionHandler(logger, shutdown, config.nodeEnv);
  setupUncaughtExceptionHandler(logger, shutdown);
  setupGracefulShutdown(logger, shutdown);

  try {
    const connector = new PgConnector({
      dsn: config.db.dsn,
      maxConns: config.db.maxConns,
      connectTimeoutMs: config.db.connectTimeoutMs,
      logger: logger.getSubLogger({ name: 'db' }),
    });
    shutdown.register('database', () => connector.close());
    await connector.ping();
    await runMigrations(connector, config.db.migrationsDir, logger.getSubLogger({ name: 'migrate' }));

    const store = new ForecastStore(connector, logger.getSubLogger({ name: 'store' }));
    const pipeline = new ForecastPipeline({
      fetcher: new ForecastClient({
        apiToken: config.forecast.apiToken,
        endpoint: config.forecast.endpoint,
        timeoutMs: config.forecast.timeoutMs,
        logger: logger.getSubLogger({ name: 'forecast' }),
      }),
      logger: logger.getSubLogger({ name: 'pipeline' }),
      signal: shutdown.signal,
      maxQueueSize: config.forecast.maxQueueSize,
    });
    const dispatcher = new CommandDispatcher({ forecaster: pipeline, store, logger });

    const health = createHealthApp({ pendingForecasts: () => pipeline.pending, logger });
    const server = health.listen(config.health.port, () => {
      logger.info('health:listening', { url: `http://localhost:${config.health.port}/health` });
    });
    shutdown.register('health server', () => closeServer(server));

    const transport = new TelegramTransport({
      token: config.telegram.token,
      apiUrl: config.telegram.apiUrl,
      pollTimeoutSec: config.telegram.pollTimeoutSec,
      debug: config.telegram.debug,
      logger,
    });
    const listening = transport.listen((cmd, signal) => dispatcher.handle(cmd, signal), shutdown.signal);
    shutdown.register('telegram', () => listening);

    logger.info('bot:started', { env: config.nodeEnv });
    await listening;
  } catch (err) {
    logger.fatal('bot:startup_failed', { error: errorMessage(err) });
    await shutdown.shutdown('startup failure', 1);
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

main().catch((err: unknown) => {
  createLogger().fatal('bot:failed', { error: errorMessage(err) });
  process.exit(1);
});
