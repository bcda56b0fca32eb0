/**
 * Health Check Routes
 *
 * /health checks the database with SELECT 1; /health/ready only reports that
 * the process is serving.
 */

import { Router, Request, Response } from 'express';
import type { Queryable } from '../database/client';
import { errorMessage } from '../errors';

export function createHealthRoutes(db: Queryable, serviceName: string): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    try {
      await db.query('SELECT 1');

      res.json({
        status: 'healthy',
        service: serviceName,
        timestamp: new Date().toISOString(),
        checks: {
          database: 'ok',
        },
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: serviceName,
        timestamp: new Date().toISOString(),
        error: errorMessage(error),
        checks: {
          database: 'failed',
        },
      });
    }
  });

  router.get('/health/ready', (_req: Request, res: Response) => {
    res.json({
      ready: true,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
