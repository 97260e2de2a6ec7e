/**
 * Environment configuration
 */

export type PuzzleSourceMode = 'daily' | 'theme';

/**
 * How a puzzle's ply offset maps onto the game record.
 * - `last-setup-ply`: offset is the 0-based index of the last move played before
 *   the puzzle starts (Lichess `initialPly`), so offset + 1 plies are replayed.
 * - `first-solution-ply`: offset is the number of plies to replay.
 */
export type PlyConvention = 'last-setup-ply' | 'first-solution-ply';

function parseChoice<T extends string>(
  value: string | undefined,
  choices: readonly T[],
  fallback: T
): T {
  const match = choices.find((choice) => choice === value);
  return match ?? fallback;
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3001', 10),
  isProduction: process.env.NODE_ENV === 'production',
  logLevel: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),

  // Supabase
  supabaseUrl: process.env.SUPABASE_URL || '',
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || '',

  // API access for the import endpoints. Auth is only bypassed when
  // NODE_ENV is explicitly "development", never when it is unset.
  importApiToken: process.env.IMPORT_API_TOKEN || '',
  authDisabled: process.env.NODE_ENV === 'development',

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:8080')
    .split(',')
    .map((o) => o.trim()),

  // Puzzle source
  lichessBaseUrl: process.env.LICHESS_BASE_URL || 'https://lichess.org',
  lichessToken: process.env.LICHESS_TOKEN || '',
  sourceMode: parseChoice<PuzzleSourceMode>(
    process.env.PUZZLE_SOURCE_MODE,
    ['daily', 'theme'],
    'theme'
  ),
  sourceDifficulty: process.env.PUZZLE_DIFFICULTY || '',
  plyConvention: parseChoice<PlyConvention>(
    process.env.PUZZLE_PLY_CONVENTION,
    ['last-setup-ply', 'first-solution-ply'],
    'last-setup-ply'
  ),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || '30000', 10),
  fetchMaxRetries: parseInt(process.env.FETCH_MAX_RETRIES || '2', 10),
  fetchRetryDelayMs: parseInt(process.env.FETCH_RETRY_DELAY_MS || '2000', 10),
  candidateAttempts: parseInt(process.env.CANDIDATE_ATTEMPTS || '10', 10),
  candidateDelayMs: parseInt(process.env.CANDIDATE_DELAY_MS || '2000', 10),
  minRating: parseInt(process.env.PUZZLE_MIN_RATING || '1200', 10),
  maxRating: parseInt(process.env.PUZZLE_MAX_RATING || '1600', 10),

  // Acceptance
  maxSolutionFullMoves: parseInt(process.env.MAX_SOLUTION_FULL_MOVES || '3', 10),
  minSolutionHalfMoves: parseInt(process.env.MIN_SOLUTION_HALF_MOVES || '1', 10),

  // Storage
  retentionDays: parseInt(process.env.RETENTION_DAYS || '30', 10),
  orphanGraceMinutes: parseInt(process.env.ORPHAN_GRACE_MINUTES || '60', 10),
  storeWriteRetries: parseInt(process.env.STORE_WRITE_RETRIES || '2', 10),
  storeRetryDelayMs: parseInt(process.env.STORE_RETRY_DELAY_MS || '1000', 10),
  storeTimeoutMs: parseInt(process.env.STORE_TIMEOUT_MS || '10000', 10),
  createdBy: process.env.PUZZLE_CREATED_BY || 'Lichess',
} as const;

export type Config = typeof config;

/**
 * Returns the required settings that are missing. Callers decide whether that
 * is fatal (the import job) or only worth a warning (the HTTP server).
 */
export function validateConfig(): string[] {
  const required = ['supabaseUrl', 'supabaseServiceKey'] as const;

  return required.filter((key) => !config[key]);
}
