/**
 * Health check routes
 */

import { Router, type Request, type Response } from 'express';
import { config } from '../../config/index.js';

const startTime = Date.now();

export function createHealthRoutes(): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      sourceMode: config.sourceMode,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      version: '1.0.0',
    });
  });

  return router;
}
