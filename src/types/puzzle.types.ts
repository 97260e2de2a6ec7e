/**
 * Puzzle Types for the Import API
 */

import type { PlyConvention } from '../config/index.js';

export type SideToMove = 'white' | 'black';

/**
 * Puzzle as delivered by the puzzle source (Lichess puzzle API shape).
 * Produced by the external source, never mutated.
 */
export interface RawPuzzlePayload {
  puzzle: {
    id?: string;
    initialPly: number;
    solution: string[]; // UCI moves: "e2e4", "e7e8q"
    rating?: number;
    themes?: string[];
  };
  game: {
    id?: string;
    pgn?: string; // move list or full PGN
    fen?: string; // direct starting position
  };
}

export type GameRecord = { kind: 'pgn'; pgn: string } | { kind: 'fen'; fen: string };

export type PositionSource = 'pgn' | 'token-scan' | 'fen';

/**
 * Board position a puzzle starts from
 */
export interface ResolvedPosition {
  fen: string;
  sideToMove: SideToMove;
  pliesApplied: number;
  pliesRequested: number;
  source: PositionSource;
  skippedTokens: string[];
}

export interface ResolveOptions {
  convention?: PlyConvention;
}

// ═══════════════════════════════════════════════════════════════════════
// Notation conversion
// ═══════════════════════════════════════════════════════════════════════

export type ConversionFailureReason = 'malformed' | 'illegal';

export interface ConversionFailure {
  index: number; // 0-based position of the rejected move
  move: string;
  reason: ConversionFailureReason;
}

export interface ConversionResult {
  san: string[];
  uci: string[]; // the accepted prefix of the input
  failure: ConversionFailure | null;
}

// ═══════════════════════════════════════════════════════════════════════
// Acceptance
// ═══════════════════════════════════════════════════════════════════════

export type RejectionReason = 'empty' | 'too-short' | 'too-long';

export type AcceptanceDecision =
  | { accepted: true; fullMoves: number }
  | { accepted: false; reason: RejectionReason; fullMoves: number; halfMoves: number };

// ═══════════════════════════════════════════════════════════════════════
// Metadata
// ═══════════════════════════════════════════════════════════════════════

/**
 * Position in a rotating list of names/themes.
 * `lastIndex` is -1 before the first use.
 */
export interface RotationCursor {
  lastIndex: number;
  names?: string[];
}

export interface RotationStep {
  value: string;
  cursor: RotationCursor;
}

// ═══════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════

export interface PuzzleRecord {
  id: string;
  puzzleId: string;
  title: string;
  description: string;
  board: string; // 64 chars, rank 8 first, space = empty square
  fen: string;
  firstMove: SideToMove;
  createdAt: string; // ISO timestamp
  createdBy: string;
  hasSolutions: boolean;
  date: string; // YYYY-MM-DD (UTC)
  rating: number | null;
  theme: string | null;
}

export interface SolutionRecord {
  id: string;
  puzzleId: string;
  solutions: string[]; // flat SAN sequence
  lastUpdated: string;
}

export interface ComposeInput {
  id: string;
  sourceId: string;
  position: ResolvedPosition;
  sanMoves: string[];
  title: string;
  description: string;
  rating?: number;
  theme?: string;
}

export interface ComposedRecords {
  puzzle: PuzzleRecord;
  solution: SolutionRecord;
}

export interface StoredPuzzleSummary {
  id: string;
  createdAt: unknown; // Date, ISO string or epoch millis depending on the backend
}

// ═══════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════

export type SkipReason = RejectionReason | 'illegal-move' | 'rating-out-of-range';

export type ImportOutcome =
  | {
      status: 'uploaded';
      puzzleId: string;
      title: string;
      description: string;
      solution: string[];
      cursorPersisted: boolean;
    }
  | { status: 'duplicate'; puzzleId: string }
  | { status: 'skipped'; puzzleId: string; reason: SkipReason; message: string };

export interface PuzzlePreview {
  puzzleId: string;
  position: ResolvedPosition;
  board: string;
  conversion: ConversionResult;
  decision: AcceptanceDecision | null;
  description: string | null;
}

export interface RetentionReport {
  scanned: number;
  retired: string[];
  orphansRemoved: string[];
  unparseable: string[];
  failures: Array<{ puzzleId: string; collection: string; message: string }>;
}
