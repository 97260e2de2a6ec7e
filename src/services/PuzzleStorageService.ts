/**
 * PuzzleStorageService
 * Dedup check, ordered upsert, rotation cursor persistence and retention,
 * on top of a PuzzleStore backend.
 *
 * Failure policy:
 * - dedup lookup failure: logged as degraded, treated as "not stored"
 * - write failure: retried a bounded number of times, then StoreUnavailableError
 * - retention failure: logged and reported per record, never thrown
 */

import { config } from '../config/index.js';
import { PAIRED_COLLECTIONS } from '../config/puzzleConstants.js';
import type { PuzzleStore } from '../store/PuzzleStore.js';
import type {
  PuzzleRecord,
  RetentionReport,
  RotationCursor,
  SolutionRecord,
  StoredPuzzleSummary,
} from '../types/puzzle.types.js';
import { withRetry } from '../utils/async.js';
import { RetentionPassError, StoreUnavailableError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { daysBefore, minutesBefore, parseTimestamp } from '../utils/timestamps.js';

const storageLogger = logger.child({ service: 'PuzzleStorage' });

export interface StorageOptions {
  retentionDays?: number;
  orphanGraceMinutes?: number;
  writeRetries?: number;
  retryDelayMs?: number;
  now?: () => Date;
}

export class PuzzleStorageService {
  private readonly retentionDays: number;
  private readonly orphanGraceMinutes: number;
  private readonly writeRetries: number;
  private readonly retryDelayMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: PuzzleStore,
    options: StorageOptions = {}
  ) {
    this.retentionDays = options.retentionDays ?? config.retentionDays;
    this.orphanGraceMinutes = options.orphanGraceMinutes ?? config.orphanGraceMinutes;
    this.writeRetries = options.writeRetries ?? config.storeWriteRetries;
    this.retryDelayMs = options.retryDelayMs ?? config.storeRetryDelayMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Whether a puzzle with this id is already stored. A failed lookup answers
   * false so the run still uploads.
   */
  async exists(id: string): Promise<boolean> {
    try {
      return await this.store.hasPuzzle(id);
    } catch (error) {
      storageLogger.warn(
        { puzzleId: id, error: errorMessage(error) },
        'Duplicate check failed, continuing with degraded confidence'
      );
      return false;
    }
  }

  /**
   * Write the puzzle row, then its solution row. If the solution write fails the
   * puzzle row is left behind as an orphan for the next retention pass.
   */
  async upsert(puzzle: PuzzleRecord, solution: SolutionRecord): Promise<void> {
    await this.write('puzzle', puzzle.id, () => this.store.writePuzzle(puzzle));

    try {
      await this.write('solution', solution.id, () => this.store.writeSolution(solution));
    } catch (error) {
      storageLogger.error({ puzzleId: puzzle.id }, 'Puzzle stored without solution, left for retention');
      throw error;
    }
  }

  async readCursor(name: string): Promise<RotationCursor | null> {
    try {
      return await this.store.readCursor(name);
    } catch (error) {
      storageLogger.error({ cursor: name, error: errorMessage(error) }, 'Failed to read rotation cursor');
      throw error instanceof StoreUnavailableError
        ? error
        : new StoreUnavailableError(`Failed to read cursor ${name}`, error);
    }
  }

  /**
   * Persist `next` if nobody advanced the cursor since `previous` was read.
   * Resolves false (and logs) on a lost race or a failed write.
   */
  async persistCursor(name: string, previous: RotationCursor | null, next: RotationCursor): Promise<boolean> {
    try {
      const written = await this.store.compareAndSetCursor(name, previous ? previous.lastIndex : null, next);
      if (!written) {
        storageLogger.warn(
          { cursor: name, expected: previous?.lastIndex ?? null, next: next.lastIndex },
          'Rotation cursor was advanced concurrently, value may repeat'
        );
      }
      return written;
    } catch (error) {
      storageLogger.error({ cursor: name, error: errorMessage(error) }, 'Failed to persist rotation cursor');
      return false;
    }
  }

  /**
   * Delete puzzles older than the retention window, with their solutions and
   * results, and puzzles whose solution row never got written.
   */
  async retire(now: Date = this.now()): Promise<RetentionReport> {
    const report: RetentionReport = {
      scanned: 0,
      retired: [],
      orphansRemoved: [],
      unparseable: [],
      failures: [],
    };
    const cutoff = daysBefore(now, this.retentionDays);
    const orphanCutoff = minutesBefore(now, this.orphanGraceMinutes);

    let puzzles: StoredPuzzleSummary[];
    try {
      puzzles = await this.store.listPuzzles();
    } catch (error) {
      storageLogger.error({ error: errorMessage(error) }, 'Retention scan failed, skipping retention pass');
      report.failures.push({ puzzleId: '*', collection: 'puzzles', message: errorMessage(error) });
      return report;
    }

    let solutionIds: Set<string> | null = null;
    try {
      solutionIds = new Set(await this.store.listSolutionIds());
    } catch (error) {
      storageLogger.warn({ error: errorMessage(error) }, 'Solution scan failed, skipping orphan cleanup');
    }

    report.scanned = puzzles.length;

    for (const summary of puzzles) {
      const createdAt = parseTimestamp(summary.createdAt);
      if (!createdAt) {
        storageLogger.warn({ puzzleId: summary.id, createdAt: summary.createdAt }, 'Could not parse creation date');
        report.unparseable.push(summary.id);
        continue;
      }

      if (createdAt.getTime() < cutoff.getTime()) {
        if (await this.deletePaired(summary.id, report)) {
          report.retired.push(summary.id);
          storageLogger.info({ puzzleId: summary.id }, 'Deleted old puzzle');
        }
      } else if (solutionIds && !solutionIds.has(summary.id) && createdAt.getTime() < orphanCutoff.getTime()) {
        if (await this.deletePaired(summary.id, report)) {
          report.orphansRemoved.push(summary.id);
          storageLogger.info({ puzzleId: summary.id }, 'Deleted puzzle without solution');
        }
      }
    }

    storageLogger.info(
      {
        scanned: report.scanned,
        retired: report.retired.length,
        orphansRemoved: report.orphansRemoved.length,
        failures: report.failures.length,
      },
      'Retention pass finished'
    );

    return report;
  }

  /**
   * Attempt every paired delete even when one fails. True when all succeeded.
   */
  private async deletePaired(id: string, report: RetentionReport): Promise<boolean> {
    let ok = true;

    for (const collection of PAIRED_COLLECTIONS) {
      try {
        await this.store.deleteRecord(collection, id);
      } catch (error) {
        ok = false;
        const failure = new RetentionPassError(id, collection, error);
        storageLogger.error({ puzzleId: id, collection, error: errorMessage(error) }, failure.message);
        report.failures.push({ puzzleId: id, collection, message: errorMessage(error) });
      }
    }

    return ok;
  }

  private async write(kind: 'puzzle' | 'solution', id: string, operation: () => Promise<void>): Promise<void> {
    try {
      await withRetry(operation, {
        retries: this.writeRetries,
        delayMs: this.retryDelayMs,
        onRetry: (error, attempt) =>
          storageLogger.warn({ puzzleId: id, kind, attempt, error: errorMessage(error) }, 'Write failed, retrying'),
      });
    } catch (error) {
      storageLogger.error({ puzzleId: id, kind, error: errorMessage(error) }, 'Write failed');
      throw error instanceof StoreUnavailableError
        ? error
        : new StoreUnavailableError(`Failed to write ${kind} ${id}: ${errorMessage(error)}`, error);
    }
  }
}
