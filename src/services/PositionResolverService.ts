/**
 * PositionResolverService
 * Rebuilds the board position a puzzle starts from, out of the game record
 * and the puzzle's ply offset.
 */

import { Chess, validateFen } from 'chess.js';
import { config, type PlyConvention } from '../config/index.js';
import type {
  GameRecord,
  RawPuzzlePayload,
  ResolvedPosition,
  ResolveOptions,
  SideToMove,
} from '../types/puzzle.types.js';
import { MalformedGameRecordError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const resolverLogger = logger.child({ service: 'PositionResolver' });

const RESULT_TOKENS = new Set(['1-0', '0-1', '1/2-1/2', '*']);

interface ReplayResult {
  chess: Chess;
  applied: number;
  skippedTokens: string[];
}

/**
 * Number of plies to replay for an offset given in `convention`
 */
export function targetPlies(plyOffset: number, convention: PlyConvention): number {
  if (!Number.isInteger(plyOffset) || plyOffset < 0) {
    throw new MalformedGameRecordError(`Ply offset must be a non-negative integer, got ${plyOffset}`);
  }
  return convention === 'last-setup-ply' ? plyOffset + 1 : plyOffset;
}

/**
 * Splits movetext into candidate SAN tokens, dropping headers, comments,
 * variations, NAGs, move numbers, annotation glyphs and results.
 */
export function tokenizeMovetext(text: string): string[] {
  let body = text
    .replace(/^\s*\[[^\]]*\]\s*$/gm, ' ')
    .replace(/\{[^}]*\}/g, ' ')
    .replace(/;[^\n]*/g, ' ')
    .replace(/\$\d+/g, ' ');

  // Variations can nest; strip innermost first
  let previous: string;
  do {
    previous = body;
    body = body.replace(/\([^()]*\)/g, ' ');
  } while (body !== previous);

  return body
    .split(/\s+/)
    .map((token) => token.replace(/^\d+\.+/, '').replace(/[!?]+$/, ''))
    .filter((token) => token.length > 0 && !RESULT_TOKENS.has(token));
}

export function sideToMove(chess: Chess): SideToMove {
  return chess.turn() === 'w' ? 'white' : 'black';
}

export function gameRecordFromPayload(payload: RawPuzzlePayload): GameRecord {
  const { pgn, fen } = payload.game;
  if (pgn && pgn.trim()) return { kind: 'pgn', pgn };
  if (fen && fen.trim()) return { kind: 'fen', fen };
  throw new MalformedGameRecordError('Puzzle payload has neither a PGN nor a FEN');
}

export class PositionResolverService {
  /**
   * Resolve the starting position of a puzzle.
   *
   * @param plyOffset Offset into the game, interpreted per `options.convention`
   * (`last-setup-ply` by default, the Lichess `initialPly` meaning)
   */
  resolve(record: GameRecord, plyOffset: number, options: ResolveOptions = {}): ResolvedPosition {
    if (record.kind === 'fen') {
      return this.fromFen(record.fen);
    }

    const convention = options.convention || config.plyConvention;
    const requested = targetPlies(plyOffset, convention);
    const pgn = record.pgn;

    if (!pgn.trim()) {
      throw new MalformedGameRecordError('Game record is empty');
    }

    const structured = this.replayStructured(pgn, requested);
    if (structured && (structured.applied > 0 || requested === 0)) {
      return this.toPosition(structured, requested, 'pgn');
    }

    const scanned = this.replayTokens(pgn, requested);
    if (scanned.skippedTokens.length > 0) {
      resolverLogger.warn(
        { skippedTokens: scanned.skippedTokens, applied: scanned.applied, requested },
        'Game record only partially parseable, using best-effort position'
      );
    }
    return this.toPosition(scanned, requested, 'token-scan');
  }

  resolvePayload(payload: RawPuzzlePayload, options: ResolveOptions = {}): ResolvedPosition {
    return this.resolve(gameRecordFromPayload(payload), payload.puzzle.initialPly, options);
  }

  private fromFen(fen: string): ResolvedPosition {
    const trimmed = fen.trim();
    const validation = validateFen(trimmed);
    if (!validation.ok) {
      throw new MalformedGameRecordError(`Invalid FEN: ${validation.error ?? 'unknown error'}`, { fen });
    }

    const chess = new Chess(trimmed);
    return this.toPosition({ chess, applied: 0, skippedTokens: [] }, 0, 'fen');
  }

  /**
   * Replay through the PGN parser. Returns null when the record does not parse.
   */
  private replayStructured(pgn: string, requested: number): ReplayResult | null {
    const parser = new Chess();
    try {
      parser.loadPgn(pgn);
    } catch (error) {
      resolverLogger.debug(
        { error: error instanceof Error ? error.message : String(error) },
        'PGN parse failed, falling back to token scan'
      );
      return null;
    }

    const history = parser.history({ verbose: true });
    const chess = this.initialBoard(pgn);
    const take = Math.min(requested, history.length);

    for (let i = 0; i < take; i++) {
      const move = history[i];
      chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    }

    return { chess, applied: take, skippedTokens: [] };
  }

  /**
   * Permissive replay: every token that is a legal move is applied, anything
   * else is skipped.
   */
  private replayTokens(pgn: string, requested: number): ReplayResult {
    const tokens = tokenizeMovetext(pgn);
    if (tokens.length === 0) {
      throw new MalformedGameRecordError('Game record contains no moves');
    }

    const chess = this.initialBoard(pgn);
    const skippedTokens: string[] = [];
    let applied = 0;

    for (const token of tokens) {
      if (applied >= requested) break;
      try {
        chess.move(token);
        applied++;
      } catch {
        skippedTokens.push(token);
      }
    }

    if (applied === 0 && requested > 0) {
      throw new MalformedGameRecordError('No move in the game record could be replayed', {
        tokens: tokens.slice(0, 10),
      });
    }

    return { chess, applied, skippedTokens };
  }

  /**
   * Board at the start of the game, honouring a [FEN] header
   */
  private initialBoard(pgn: string): Chess {
    const headers = this.extractHeaders(pgn);
    const fen = headers['FEN'];
    if (fen && validateFen(fen).ok) {
      return new Chess(fen);
    }
    return new Chess();
  }

  private extractHeaders(pgn: string): Record<string, string> {
    const headers: Record<string, string> = {};
    const headerRegex = /\[(\w+)\s+"([^"]*)"\]/g;

    let match: RegExpExecArray | null;
    while ((match = headerRegex.exec(pgn)) !== null) {
      headers[match[1]] = match[2];
    }

    return headers;
  }

  private toPosition(replay: ReplayResult, requested: number, source: ResolvedPosition['source']): ResolvedPosition {
    return {
      fen: replay.chess.fen(),
      sideToMove: sideToMove(replay.chess),
      pliesApplied: replay.applied,
      pliesRequested: requested,
      source,
      skippedTokens: replay.skippedTokens,
    };
  }
}

// Singleton instance
export const positionResolverService = new PositionResolverService();
