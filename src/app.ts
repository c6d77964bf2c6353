import express from 'express';
import pool from './db';
import { errorHandler, notFoundHandler } from './middleware/error-handler';
import boardingRouter from './routes/boarding';
import flightsRouter from './routes/flights';
import reportsRouter from './routes/reports';
import { ErrorCodes } from './utils/errors';
import { logger } from './utils/logger';

export function buildApp() {
  const app = express();
  app.use(express.json());

  app.get('/health', async (_req, res) => {
    try {
      await pool.query('SELECT 1');
      return res.json({ code: 200, data: { status: 'ok', database: 'connected' } });
    } catch (err) {
      logger.error({ err }, 'database health check failed');
      return res.status(503).json({ code: 503, errors: ErrorCodes.DATABASE_UNAVAILABLE });
    }
  });

  app.use('/flights', flightsRouter);
  app.use('/boarding', boardingRouter);
  app.use('/reports', reportsRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
