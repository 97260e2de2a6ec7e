/**
 * Express application setup
 */

import express, { type Express } from 'express';
import helmet from 'helmet';
import { PuzzleController } from './api/controllers/puzzle.controller.js';
import { corsMiddleware } from './api/middleware/cors.middleware.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import { createApiRoutes } from './api/routes/index.js';
import type { PuzzleImportService } from './services/PuzzleImportService.js';
import type { PuzzleStorageService } from './services/PuzzleStorageService.js';
import { logger } from './utils/logger.js';

export interface AppDependencies {
  importService: PuzzleImportService;
  storage: PuzzleStorageService;
}

export function createApp({ importService, storage }: AppDependencies): Express {
  const app = express();

  // Security headers
  app.use(helmet());

  // CORS
  app.use(corsMiddleware);

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: `${duration}ms`,
        },
        'Request completed'
      );
    });

    next();
  });

  // API routes
  app.use('/api/v1', createApiRoutes(new PuzzleController(importService, storage)));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'Puzzle Import API',
      version: '1.0.0',
      status: 'running',
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
