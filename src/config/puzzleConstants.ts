/**
 * Puzzle Import Constants
 */

// ═══════════════════════════════════════════════════════════════════════
// TITLE & THEME ROTATION
// ═══════════════════════════════════════════════════════════════════════

// Puzzle titles rotate through this list, one name per uploaded puzzle.
// A `names` array stored on the cursor row takes precedence over it.
export const GRANDMASTER_NAMES: readonly string[] = [
  'Magnus Carlsen',
  'Garry Kasparov',
  'Bobby Fischer',
  'Anatoly Karpov',
  'Mikhail Tal',
  'Jose Raul Capablanca',
  'Paul Morphy',
  'Emanuel Lasker',
  'Viswanathan Anand',
  'Hikaru Nakamura',
  'Fabiano Caruana',
  'Wesley So',
  'Ding Liren',
  'Ian Nepomniachtchi',
  'Alireza Firouzja',
  'Levon Aronian',
];

// Lichess puzzle angles requested in turn when fetching by theme
export const PUZZLE_THEMES: readonly string[] = ['mateIn1', 'mateIn2', 'advantage', 'mateIn3'];

// Rows in the `metadata` table holding the rotation cursors
export const TITLE_CURSOR_NAME = 'grandmasters';
export const THEME_CURSOR_NAME = 'puzzle_themes';

// ═══════════════════════════════════════════════════════════════════════
// ACCEPTANCE & RETENTION
// ═══════════════════════════════════════════════════════════════════════

// A full move is one white and one black ply: 3 full moves = 6 half-moves
export const DEFAULT_MAX_FULL_MOVES = 3;

export const DEFAULT_MIN_HALF_MOVES = 1;

export const DEFAULT_RETENTION_DAYS = 30;

export const DEFAULT_ORPHAN_GRACE_MINUTES = 60;

// Tables the retention pass clears for one puzzle id
export const PAIRED_COLLECTIONS = ['puzzles', 'solutions', 'results'] as const;

// ═══════════════════════════════════════════════════════════════════════
// DESCRIPTIONS
// ═══════════════════════════════════════════════════════════════════════

export const CHECK_DESCRIPTION = 'Find the sequence of checks that exploits the exposed king.';

export const ADVANTAGE_DESCRIPTION = 'Find the best move to gain a decisive advantage.';

export function mateDescription(fullMoves: number): string {
  return `Find the forced mate in ${fullMoves} ${fullMoves === 1 ? 'move' : 'moves'}.`;
}
