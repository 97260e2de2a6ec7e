import { describe, it, expect } from 'vitest';
import { withRetry } from '../utils/async.js';
import {
  ConfigError,
  ExitCode,
  IllegalSolutionMoveError,
  InvalidPayloadError,
  MalformedGameRecordError,
  SourceUnavailableError,
  StoreUnavailableError,
  exitCodeFor,
} from '../utils/errors.js';
import { daysBefore, minutesBefore, parseTimestamp } from '../utils/timestamps.js';
import { importRequestSchema, rawPuzzlePayloadSchema, retentionRequestSchema, validateRequest } from '../utils/validation.js';

describe('exitCodeFor', () => {
  it('maps each failure kind to its exit code', () => {
    expect(exitCodeFor(new ConfigError('missing'))).toBe(ExitCode.CONFIG);
    expect(exitCodeFor(new SourceUnavailableError('down'))).toBe(ExitCode.SOURCE_UNAVAILABLE);
    expect(exitCodeFor(new MalformedGameRecordError('bad pgn'))).toBe(ExitCode.MALFORMED_GAME_RECORD);
    expect(exitCodeFor(new StoreUnavailableError('down'))).toBe(ExitCode.STORE_UNAVAILABLE);
    expect(exitCodeFor(new InvalidPayloadError('shape'))).toBe(ExitCode.INVALID_PAYLOAD);
    expect(exitCodeFor(new Error('boom'))).toBe(ExitCode.UNEXPECTED);
    expect(exitCodeFor('boom')).toBe(ExitCode.UNEXPECTED);
  });

  it('treats a rejected solution as a normal outcome', () => {
    const error = new IllegalSolutionMoveError(2, 'e1e3', 'illegal');
    expect(error.message).toBe('Solution move 2 (e1e3) is illegal');
    expect(exitCodeFor(error)).toBe(ExitCode.SUCCESS);
  });
});

describe('parseTimestamp', () => {
  const expected = new Date('2026-05-01T00:00:00.000Z');

  it('reads Date objects, ISO strings and epoch millis', () => {
    expect(parseTimestamp(expected)).toEqual(expected);
    expect(parseTimestamp('2026-05-01T00:00:00.000Z')).toEqual(expected);
    expect(parseTimestamp(expected.getTime())).toEqual(expected);
  });

  it('returns null for anything else', () => {
    expect(parseTimestamp('yesterday-ish')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(null)).toBeNull();
    expect(parseTimestamp({ seconds: 1 })).toBeNull();
    expect(parseTimestamp(new Date('invalid'))).toBeNull();
  });

  it('computes cutoffs', () => {
    expect(daysBefore(expected, 30).toISOString()).toBe('2026-04-01T00:00:00.000Z');
    expect(minutesBefore(expected, 60).toISOString()).toBe('2026-04-30T23:00:00.000Z');
  });
});

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return 'done';
      },
      { retries: 2, delayMs: 0 }
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
  });

  it('rethrows the last error', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`attempt ${calls}`);
        },
        { retries: 1, delayMs: 0 }
      )
    ).rejects.toThrow('attempt 2');
  });
});

describe('validation', () => {
  it('requires a PGN or a FEN', () => {
    const result = rawPuzzlePayloadSchema.safeParse({ puzzle: { initialPly: 1, solution: ['e2e4'] }, game: {} });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe('game.pgn or game.fen is required');
    }
  });

  it('rejects a negative ply offset', () => {
    const result = rawPuzzlePayloadSchema.safeParse({
      puzzle: { initialPly: -1, solution: [] },
      game: { pgn: '1. e4' },
    });
    expect(result.success).toBe(false);
  });

  it('accepts an empty import request', () => {
    expect(validateRequest(importRequestSchema, {})).toEqual({ success: true, data: {} });
  });

  it('refuses a client-supplied reference time for retention', () => {
    expect(validateRequest(retentionRequestSchema, { now: '2100-01-01T00:00:00Z' }).success).toBe(false);
    expect(validateRequest(retentionRequestSchema, {})).toEqual({ success: true, data: {} });
  });
});
