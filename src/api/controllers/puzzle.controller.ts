/**
 * Puzzle Controller
 * Preview, import and retention endpoints over the import pipeline
 */

import type { Request, Response } from 'express';
import type { PuzzleImportService } from '../../services/PuzzleImportService.js';
import type { PuzzleStorageService } from '../../services/PuzzleStorageService.js';
import { logger } from '../../utils/logger.js';
import {
  importRequestSchema,
  rawPuzzlePayloadSchema,
  retentionRequestSchema,
  validateRequest,
} from '../../utils/validation.js';

const puzzleLogger = logger.child({ controller: 'puzzle' });

export class PuzzleController {
  constructor(
    private readonly importService: PuzzleImportService,
    private readonly storage: PuzzleStorageService
  ) {}

  /**
   * POST /api/v1/puzzles/preview
   * Normalize a puzzle without storing anything
   */
  async preview(req: Request, res: Response): Promise<void> {
    const validation = validateRequest(rawPuzzlePayloadSchema, req.body);
    if (!validation.success) {
      throw validation.errors;
    }

    const preview = this.importService.preview(validation.data);

    res.json({
      puzzleId: preview.puzzleId,
      fen: preview.position.fen,
      board: preview.board,
      sideToMove: preview.position.sideToMove,
      pliesApplied: preview.position.pliesApplied,
      positionSource: preview.position.source,
      solution: preview.conversion.san,
      failure: preview.conversion.failure,
      accepted: preview.decision?.accepted ?? false,
      decision: preview.decision,
      description: preview.description,
    });
  }

  /**
   * POST /api/v1/puzzles/import
   * Import the posted puzzle, or run a full scheduled import when the body has none
   */
  async import(req: Request, res: Response): Promise<void> {
    const validation = validateRequest(importRequestSchema, req.body ?? {});
    if (!validation.success) {
      throw validation.errors;
    }

    const { payload } = validation.data;

    if (payload) {
      puzzleLogger.info({ puzzleId: payload.puzzle.id }, 'Importing posted puzzle');
      const outcome = await this.importService.processPayload(payload);
      res.status(outcome.status === 'uploaded' ? 201 : 200).json({ outcome });
      return;
    }

    puzzleLogger.info('Running scheduled import');
    const result = await this.importService.run();
    res.status(result.outcome?.status === 'uploaded' ? 201 : 200).json(result);
  }

  /**
   * POST /api/v1/puzzles/retention
   * Run one retention pass against server time
   */
  async retention(req: Request, res: Response): Promise<void> {
    const validation = validateRequest(retentionRequestSchema, req.body ?? {});
    if (!validation.success) {
      throw validation.errors;
    }

    const report = await this.storage.retire();
    res.json(report);
  }
}
