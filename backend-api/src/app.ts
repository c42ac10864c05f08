import express from 'express';
import cors from 'cors';

import type { AppDb } from './database/db.js';
import { healthRouter } from './routes/health.js';
import { repairOrdersRouter } from './routes/repairOrders.js';
import { creditsRouter } from './routes/credits.js';
import { reportsRouter } from './routes/reports.js';
import { employeesRouter } from './routes/employees.js';
import { timeClockRouter } from './routes/timeClock.js';
import { settingsRouter } from './routes/settings.js';
import { errorHandler } from './middleware/errorHandler.js';

export function createApp(db: AppDb) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/health', healthRouter);
  app.use('/repair-orders', repairOrdersRouter(db));
  app.use('/credits', creditsRouter(db));
  app.use('/reports', reportsRouter(db));
  app.use('/employees', employeesRouter(db));
  app.use('/time-clock', timeClockRouter(db));
  app.use('/settings', settingsRouter(db));

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
