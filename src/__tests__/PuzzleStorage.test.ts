import { describe, it, expect, beforeEach } from 'vitest';
import { RecordComposerService } from '../services/RecordComposerService.js';
import { PuzzleStorageService } from '../services/PuzzleStorageService.js';
import { StoreUnavailableError } from '../utils/errors.js';
import { InMemoryPuzzleStore } from './fakes/InMemoryPuzzleStore.js';
import { START_FEN } from './fixtures.js';

const NOW = new Date('2026-06-30T12:00:00.000Z');

function composeRecords(id: string) {
  const composer = new RecordComposerService('test', () => NOW);
  return composer.compose({
    id,
    sourceId: id,
    position: {
      fen: START_FEN,
      sideToMove: 'white',
      pliesApplied: 0,
      pliesRequested: 0,
      source: 'fen',
      skippedTokens: [],
    },
    sanMoves: ['e4'],
    title: 'Test Title',
    description: 'Test description',
  });
}

describe('PuzzleStorageService', () => {
  let store: InMemoryPuzzleStore;
  let storage: PuzzleStorageService;

  beforeEach(() => {
    store = new InMemoryPuzzleStore();
    storage = new PuzzleStorageService(store, {
      retentionDays: 30,
      orphanGraceMinutes: 60,
      writeRetries: 1,
      retryDelayMs: 0,
      now: () => NOW,
    });
  });

  describe('exists', () => {
    it('reports stored puzzles', async () => {
      store.seedPuzzle('p1', NOW.toISOString());

      expect(await storage.exists('p1')).toBe(true);
      expect(await storage.exists('p2')).toBe(false);
    });

    it('answers false when the lookup fails', async () => {
      store.seedPuzzle('p1', NOW.toISOString());
      store.failNext('hasPuzzle');

      expect(await storage.exists('p1')).toBe(false);
    });
  });

  describe('upsert', () => {
    it('writes the puzzle before its solution', async () => {
      const { puzzle, solution } = composeRecords('p1');
      await storage.upsert(puzzle, solution);

      expect(store.writes).toEqual(['puzzles/p1', 'solutions/p1']);
      expect(store.puzzles.get('p1')).toEqual(puzzle);
      expect(store.solutions.get('p1')).toEqual(solution);
    });

    it('overwrites an existing record with the same id', async () => {
      const first = composeRecords('p1');
      await storage.upsert(first.puzzle, first.solution);
      await storage.upsert({ ...first.puzzle, title: 'Renamed' }, first.solution);

      expect(store.puzzles.size).toBe(1);
      expect(store.puzzles.get('p1')?.title).toBe('Renamed');
    });

    it('retries a failed write', async () => {
      const { puzzle, solution } = composeRecords('p1');
      store.failNext('writeSolution');

      await storage.upsert(puzzle, solution);
      expect(store.writes).toEqual(['puzzles/p1', 'solutions/p1']);
    });

    it('leaves an orphan puzzle when the solution write keeps failing', async () => {
      const { puzzle, solution } = composeRecords('p1');
      store.failNext('writeSolution', 2);

      await expect(storage.upsert(puzzle, solution)).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(store.puzzles.has('p1')).toBe(true);
      expect(store.solutions.has('p1')).toBe(false);
    });

    it('writes nothing when the puzzle write keeps failing', async () => {
      const { puzzle, solution } = composeRecords('p1');
      store.failNext('writePuzzle', 2);

      await expect(storage.upsert(puzzle, solution)).rejects.toBeInstanceOf(StoreUnavailableError);
      expect(store.writes).toEqual([]);
    });
  });

  describe('cursors', () => {
    it('creates a cursor that does not exist yet', async () => {
      expect(await storage.readCursor('grandmasters')).toBeNull();
      expect(await storage.persistCursor('grandmasters', null, { lastIndex: 0 })).toBe(true);
      expect(await storage.readCursor('grandmasters')).toEqual({ lastIndex: 0 });
    });

    it('refuses to overwrite a cursor advanced by someone else', async () => {
      store.cursors.set('grandmasters', { lastIndex: 4 });

      expect(await storage.persistCursor('grandmasters', { lastIndex: 3 }, { lastIndex: 4 })).toBe(false);
      expect(store.cursors.get('grandmasters')).toEqual({ lastIndex: 4 });
    });

    it('answers false when the cursor write fails', async () => {
      store.failNext('compareAndSetCursor');
      expect(await storage.persistCursor('grandmasters', null, { lastIndex: 0 })).toBe(false);
    });

    it('surfaces a failed cursor read as a store error', async () => {
      store.failNext('readCursor');
      await expect(storage.readCursor('grandmasters')).rejects.toBeInstanceOf(StoreUnavailableError);
    });
  });

  describe('retire', () => {
    it('deletes puzzles older than the retention window with their solutions and results', async () => {
      store.seedPuzzle('old-iso', '2026-05-20T00:00:00.000Z');
      store.seedPuzzle('fresh-date', new Date('2026-06-20T00:00:00.000Z'));
      store.seedPuzzle('old-millis', Date.parse('2026-05-01T00:00:00.000Z'));
      store.seedPuzzle('boundary', '2026-05-31T12:00:00.000Z');
      store.seedPuzzle('bad', 'not-a-date');

      const report = await storage.retire();

      expect(report).toEqual({
        scanned: 5,
        retired: ['old-iso', 'old-millis'],
        orphansRemoved: [],
        unparseable: ['bad'],
        failures: [],
      });
      expect([...store.puzzles.keys()]).toEqual(['fresh-date', 'boundary', 'bad']);
      expect([...store.solutions.keys()]).toEqual(['fresh-date', 'boundary', 'bad']);
      expect([...store.results.keys()]).toEqual(['fresh-date', 'boundary', 'bad']);
    });

    it('takes the reference time as an argument', async () => {
      store.seedPuzzle('fresh-date', new Date('2026-06-20T00:00:00.000Z'));

      const report = await storage.retire(new Date('2026-08-01T00:00:00.000Z'));
      expect(report.retired).toEqual(['fresh-date']);
    });

    it('keeps deleting the paired records when one delete fails', async () => {
      store.seedPuzzle('old', '2026-05-01T00:00:00.000Z');
      store.failNext('delete:solutions');

      const report = await storage.retire();

      expect(report.retired).toEqual([]);
      expect(report.failures).toEqual([
        { puzzleId: 'old', collection: 'solutions', message: 'delete:solutions failed (injected)' },
      ]);
      expect(store.puzzles.has('old')).toBe(false);
      expect(store.solutions.has('old')).toBe(true);
      expect(store.results.has('old')).toBe(false);
    });

    it('removes puzzles whose solution was never written once the grace period passed', async () => {
      store.seedPuzzle('orphan-old', '2026-06-30T10:00:00.000Z', { withSolution: false });
      store.seedPuzzle('orphan-new', '2026-06-30T11:50:00.000Z', { withSolution: false });
      store.seedPuzzle('complete', '2026-06-30T10:00:00.000Z');

      const report = await storage.retire();

      expect(report.orphansRemoved).toEqual(['orphan-old']);
      expect([...store.puzzles.keys()]).toEqual(['orphan-new', 'complete']);
    });

    it('skips orphan cleanup when the solution scan fails', async () => {
      store.seedPuzzle('orphan-old', '2026-06-30T10:00:00.000Z', { withSolution: false });
      store.failNext('listSolutionIds');

      const report = await storage.retire();
      expect(report.orphansRemoved).toEqual([]);
      expect(store.puzzles.has('orphan-old')).toBe(true);
    });

    it('reports a failed scan without throwing', async () => {
      store.failNext('listPuzzles');

      const report = await storage.retire();
      expect(report.scanned).toBe(0);
      expect(report.failures).toEqual([
        { puzzleId: '*', collection: 'puzzles', message: 'listPuzzles failed (injected)' },
      ]);
    });
  });
});
