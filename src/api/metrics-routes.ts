/**
 * Metrics Routes
 *
 * Serves a prom-client registry in Prometheus text format. The default
 * registry carries the backup run counters.
 */

import { Router, Request, Response } from 'express';
import { register, Registry } from 'prom-client';
import { errorMessage } from '../errors';

export function createMetricsRoutes(registry: Registry = register): Router {
  const router = Router();

  router.get('/metrics', async (_req: Request, res: Response) => {
    try {
      res.set('Content-Type', registry.contentType);
      res.end(await registry.metrics());
    } catch (error) {
      res.status(500).end(errorMessage(error));
    }
  });

  return router;
}
