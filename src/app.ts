/**
 * Express application: health and metrics routes only.
 */

import express from 'express';
import type { Queryable } from './database/client';
import { config } from './config';
import { createHealthRoutes } from './api/health-routes';
import { createMetricsRoutes } from './api/metrics-routes';

export function createApp(db: Queryable): express.Express {
  const app = express();
  app.use(createHealthRoutes(db, config.service.name));
  app.use(createMetricsRoutes());
  return app;
}
