import { Router } from 'express';
import type { Request, Response } from 'express';
import type { DatabaseAdapter } from '../database/adapter';
import { getDatabase } from '../database';
import { Logger } from '../utils/logger';

export function createHealthRouter(database: () => DatabaseAdapter = getDatabase): Router {
  const healthRouter = Router();

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check endpoint
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is healthy
   *       503:
   *         description: Database is not available
   */
  healthRouter.get('/', (req: Request, res: Response) => {
    try {
      const dbStatus = database().isConnected() ? 'connected' : 'disconnected';

      res.status(dbStatus === 'connected' ? 200 : 503).json({
        status: dbStatus === 'connected' ? 'ok' : 'degraded',
        database: dbStatus,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      Logger.error('Health check failed', error, { method: 'GET', url: '/health' });
      res.status(503).json({
        status: 'error',
        message: 'Service unavailable',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return healthRouter;
}
