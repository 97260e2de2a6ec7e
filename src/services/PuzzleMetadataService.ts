/**
 * PuzzleMetadataService
 * Title rotation and description for an accepted puzzle.
 *
 * Rotation is a pure step over an explicit cursor: the caller reads the cursor
 * from the store, and persists the returned cursor once the puzzle is stored.
 */

import {
  ADVANTAGE_DESCRIPTION,
  CHECK_DESCRIPTION,
  GRANDMASTER_NAMES,
  PUZZLE_THEMES,
  mateDescription,
} from '../config/puzzleConstants.js';
import type { RotationCursor, RotationStep } from '../types/puzzle.types.js';
import { ConfigError } from '../utils/errors.js';
import { fullMoveCount } from './AcceptanceGateService.js';

/**
 * Advance `cursor` by one over `list`. A missing cursor starts at index 0.
 */
export function rotate(cursor: RotationCursor | null, list: readonly string[]): RotationStep {
  if (list.length === 0) {
    throw new ConfigError('Rotation list is empty');
  }

  const lastIndex = cursor?.lastIndex ?? -1;
  // Guard against a stored index from a longer list
  const nextIndex = (((lastIndex + 1) % list.length) + list.length) % list.length;

  return {
    value: list[nextIndex],
    cursor: cursor?.names ? { lastIndex: nextIndex, names: cursor.names } : { lastIndex: nextIndex },
  };
}

export class PuzzleMetadataService {
  constructor(
    private readonly defaultNames: readonly string[] = GRANDMASTER_NAMES,
    private readonly themes: readonly string[] = PUZZLE_THEMES
  ) {}

  /**
   * Next title. A name list stored on the cursor wins over the default list.
   */
  nextTitle(cursor: RotationCursor | null): { title: string; cursor: RotationCursor } {
    const names = cursor?.names && cursor.names.length > 0 ? cursor.names : this.defaultNames;
    const step = rotate(cursor, names);
    return { title: step.value, cursor: step.cursor };
  }

  nextTheme(cursor: RotationCursor | null): { theme: string; cursor: RotationCursor } {
    const step = rotate(cursor ? { lastIndex: cursor.lastIndex } : null, this.themes);
    return { theme: step.value, cursor: step.cursor };
  }

  describe(sanMoves: readonly string[]): string {
    const last = sanMoves[sanMoves.length - 1];

    if (last?.endsWith('#')) {
      return mateDescription(fullMoveCount(sanMoves.length));
    }
    if (last?.endsWith('+')) {
      return CHECK_DESCRIPTION;
    }
    return ADVANTAGE_DESCRIPTION;
  }
}

// Singleton instance
export const puzzleMetadataService = new PuzzleMetadataService();
