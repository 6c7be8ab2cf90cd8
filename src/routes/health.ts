import express, { type Express, type Request, type Response } from 'express';
import type { AppLogger } from '@/services/logger';

export interface HealthDeps {
  /** Forecast requests waiting or in flight. */
  pendingForecasts: () => number;
  logger: AppLogger;
}

export function createHealthApp({ pendingForecasts, logger }: HealthDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/health', (req: Request, res: Response) => {
    logger.debug('health:check', { ip: req.ip ?? 'unknown' });
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      pendingForecasts: pendingForecasts(),
    });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
