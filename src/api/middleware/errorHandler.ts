/**
 * Global error handler middleware
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../../utils/logger.js';
import { config } from '../../config/index.js';
import { PipelineError } from '../../utils/errors.js';

const errorLogger = logger.child({ middleware: 'errorHandler' });

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const error = err instanceof Error ? err : new Error(String(err));

  errorLogger.error(
    {
      error: error.message,
      stack: error.stack,
      path: req.path,
      method: req.method,
      code: error instanceof PipelineError ? error.code : undefined,
    },
    'Request error'
  );

  // Handle Zod validation errors
  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      code: 'VALIDATION_ERROR',
      details: error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
    return;
  }

  // Handle known pipeline errors
  if (error instanceof PipelineError) {
    res.status(error.statusCode).json({
      error: error.message,
      code: error.code,
      ...(config.isProduction ? {} : { details: error.details }),
    });
    return;
  }

  // Handle unknown errors
  res.status(500).json({
    error: config.isProduction ? 'Internal server error' : error.message,
    code: 'INTERNAL_ERROR',
    ...(config.isProduction ? {} : { stack: error.stack }),
  });
}
