/**
 * NotationConverterService
 * Converts a UCI solution line into SAN, one ply at a time.
 *
 * SAN depends on the board at each step (disambiguation, check and mate
 * suffixes), so moves are converted strictly in order against a single board.
 * Legality is strict: chess.js only generates fully legal moves, so a move that
 * would leave the mover's own king attacked is rejected like any other.
 */

import { Chess } from 'chess.js';
import type { ConversionResult } from '../types/puzzle.types.js';
import { logger } from '../utils/logger.js';
import { parseUciMove } from '../utils/uci.js';

const converterLogger = logger.child({ service: 'NotationConverter' });

export class NotationConverterService {
  /**
   * Convert `uciMoves` played from `fen`. Stops at the first move that cannot be
   * played and reports it; the SAN produced up to that point is kept.
   */
  convert(fen: string, uciMoves: readonly string[]): ConversionResult {
    const chess = new Chess(fen);
    const san: string[] = [];
    const uci: string[] = [];

    for (let index = 0; index < uciMoves.length; index++) {
      const move = uciMoves[index];
      const parsed = parseUciMove(move);

      if (!parsed) {
        converterLogger.warn({ index, move }, 'Malformed UCI move in solution');
        return { san, uci, failure: { index, move, reason: 'malformed' } };
      }

      const legal = chess
        .moves({ verbose: true })
        .find(
          (candidate) =>
            candidate.from === parsed.from &&
            candidate.to === parsed.to &&
            candidate.promotion === parsed.promotion
        );

      if (!legal) {
        converterLogger.warn({ index, move, fen: chess.fen() }, 'Illegal move in solution');
        return { san, uci, failure: { index, move, reason: 'illegal' } };
      }

      chess.move({ from: legal.from, to: legal.to, promotion: legal.promotion });
      san.push(legal.san);
      uci.push(move);
    }

    return { san, uci, failure: null };
  }

  /**
   * FEN after each SAN move played from `fen`
   */
  replay(fen: string, sanMoves: readonly string[]): string[] {
    const chess = new Chess(fen);
    return sanMoves.map((move) => {
      chess.move(move);
      return chess.fen();
    });
  }
}

// Singleton instance
export const notationConverterService = new NotationConverterService();
