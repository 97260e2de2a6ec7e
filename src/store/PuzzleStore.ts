/**
 * Persistence boundary for puzzles, solutions and rotation cursors.
 *
 * Implementations throw on connectivity or query failures; the policy for
 * each failure (degrade, retry, fail the run) lives in PuzzleStorageService.
 */

import type {
  PuzzleRecord,
  RotationCursor,
  SolutionRecord,
  StoredPuzzleSummary,
} from '../types/puzzle.types.js';
import type { PAIRED_COLLECTIONS } from '../config/puzzleConstants.js';

export type PairedCollection = (typeof PAIRED_COLLECTIONS)[number];

export interface PuzzleStore {
  hasPuzzle(id: string): Promise<boolean>;
  writePuzzle(record: PuzzleRecord): Promise<void>;
  writeSolution(record: SolutionRecord): Promise<void>;

  listPuzzles(): Promise<StoredPuzzleSummary[]>;
  listSolutionIds(): Promise<string[]>;
  deleteRecord(collection: PairedCollection, id: string): Promise<void>;

  readCursor(name: string): Promise<RotationCursor | null>;
  /**
   * Write `next` only if the stored cursor still has `expectedLastIndex`
   * (null: no cursor stored yet). Resolves false when another writer got there first.
   */
  compareAndSetCursor(name: string, expectedLastIndex: number | null, next: RotationCursor): Promise<boolean>;
}
