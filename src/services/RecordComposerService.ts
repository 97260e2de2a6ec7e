/**
 * RecordComposerService
 * Builds the stored puzzle and solution rows.
 *
 * Supabase array columns are one-dimensional, so nothing composed here is an
 * array of arrays: the board is a flat string and the solution a flat list.
 */

import { createHash } from 'crypto';
import { config } from '../config/index.js';
import type { ComposedRecords, ComposeInput, RawPuzzlePayload } from '../types/puzzle.types.js';

/**
 * 64-character board: rank 8 to rank 1, files a to h, piece letters as in FEN
 * and a space for an empty square.
 */
export function serializeBoard(fen: string): string {
  const placement = fen.trim().split(/\s+/)[0];
  return placement.replace(/\//g, '').replace(/[1-8]/g, (digit) => ' '.repeat(Number(digit)));
}

/**
 * Stable record id: the source's own id, or a hash over the fields that define
 * the puzzle when the source has none.
 */
export function composeId(payload: RawPuzzlePayload): string {
  const sourceId = payload.puzzle.id?.trim();
  if (sourceId) return sourceId;

  const hash = createHash('sha256')
    .update(payload.game.pgn ?? '')
    .update('\n')
    .update(payload.game.fen ?? '')
    .update('\n')
    .update(String(payload.puzzle.initialPly))
    .update('\n')
    .update(payload.puzzle.solution.join(' '))
    .digest('hex');

  return `h-${hash.slice(0, 20)}`;
}

export class RecordComposerService {
  constructor(
    private readonly createdBy: string = config.createdBy,
    private readonly now: () => Date = () => new Date()
  ) {}

  compose(input: ComposeInput): ComposedRecords {
    const timestamp = this.now();
    const iso = timestamp.toISOString();

    return {
      puzzle: {
        id: input.id,
        puzzleId: input.sourceId,
        title: input.title,
        description: input.description,
        board: serializeBoard(input.position.fen),
        fen: input.position.fen,
        firstMove: input.position.sideToMove,
        createdAt: iso,
        createdBy: this.createdBy,
        hasSolutions: input.sanMoves.length > 0,
        date: iso.slice(0, 10),
        rating: input.rating ?? null,
        theme: input.theme ?? null,
      },
      solution: {
        id: input.id,
        puzzleId: input.sourceId,
        solutions: [...input.sanMoves],
        lastUpdated: iso,
      },
    };
  }
}

// Singleton instance
export const recordComposerService = new RecordComposerService();
