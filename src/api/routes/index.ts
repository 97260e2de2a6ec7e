/**
 * API routes index
 */

import { Router } from 'express';
import type { PuzzleController } from '../controllers/puzzle.controller.js';
import { createHealthRoutes } from './health.routes.js';
import { createPuzzleRoutes } from './puzzle.routes.js';

export function createApiRoutes(puzzleController: PuzzleController): Router {
  const router = Router();

  // Mount routes
  router.use('/health', createHealthRoutes());
  router.use('/puzzles', createPuzzleRoutes(puzzleController));

  return router;
}
