/**
 * Puzzle import routes
 */

import { Router } from 'express';
import type { PuzzleController } from '../controllers/puzzle.controller.js';
import { authMiddleware } from '../middleware/auth.middleware.js';

export function createPuzzleRoutes(puzzleController: PuzzleController): Router {
  const router = Router();

  /**
   * POST /api/v1/puzzles/preview
   * Resolve, convert and gate a puzzle without storing it
   *
   * Request body: Lichess puzzle payload
   * {
   *   puzzle: { id?, initialPly, solution: string[], rating?, themes? },
   *   game: { pgn?, fen? }
   * }
   */
  router.post('/preview', (req, res, next) => {
    puzzleController.preview(req, res).catch(next);
  });

  /**
   * POST /api/v1/puzzles/import
   * Request body: { payload?: <Lichess puzzle payload> }
   * Without a payload a puzzle is fetched from the configured source.
   */
  router.post('/import', authMiddleware, (req, res, next) => {
    puzzleController.import(req, res).catch(next);
  });

  /**
   * POST /api/v1/puzzles/retention
   * Request body: {} (no options)
   */
  router.post('/retention', authMiddleware, (req, res, next) => {
    puzzleController.retention(req, res).catch(next);
  });

  return router;
}
