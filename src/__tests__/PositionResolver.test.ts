import { Chess } from 'chess.js';
import { describe, it, expect } from 'vitest';
import {
  PositionResolverService,
  gameRecordFromPayload,
  targetPlies,
  tokenizeMovetext,
} from '../services/PositionResolverService.js';
import { MalformedGameRecordError } from '../utils/errors.js';
import { ITALIAN_FEN, ITALIAN_PGN, START_FEN } from './fixtures.js';

const resolver = new PositionResolverService();

describe('targetPlies', () => {
  it('replays one extra ply for the last setup ply convention', () => {
    expect(targetPlies(9, 'last-setup-ply')).toBe(10);
    expect(targetPlies(0, 'last-setup-ply')).toBe(1);
  });

  it('replays exactly the offset for the first solution ply convention', () => {
    expect(targetPlies(10, 'first-solution-ply')).toBe(10);
    expect(targetPlies(0, 'first-solution-ply')).toBe(0);
  });

  it('rejects negative and fractional offsets', () => {
    expect(() => targetPlies(-1, 'last-setup-ply')).toThrow(MalformedGameRecordError);
    expect(() => targetPlies(1.5, 'first-solution-ply')).toThrow(MalformedGameRecordError);
  });
});

describe('tokenizeMovetext', () => {
  it('drops headers, comments, variations, NAGs, move numbers and results', () => {
    const pgn = [
      '[Event "Casual"]',
      '[Site "Local"]',
      '',
      '1. e4 {best by test} e5 2. Nf3 (2. f4 exf4 (2... d5)) Nc6!? $1 3... Bc5 ; aside',
      '1-0',
    ].join('\n');

    expect(tokenizeMovetext(pgn)).toEqual(['e4', 'e5', 'Nf3', 'Nc6', 'Bc5']);
  });
});

describe('gameRecordFromPayload', () => {
  it('prefers the PGN over the FEN', () => {
    const record = gameRecordFromPayload({
      puzzle: { initialPly: 0, solution: [] },
      game: { pgn: '1. e4', fen: START_FEN },
    });
    expect(record).toEqual({ kind: 'pgn', pgn: '1. e4' });
  });

  it('falls back to the FEN when the PGN is blank', () => {
    const record = gameRecordFromPayload({
      puzzle: { initialPly: 0, solution: [] },
      game: { pgn: '   ', fen: START_FEN },
    });
    expect(record).toEqual({ kind: 'fen', fen: START_FEN });
  });

  it('throws when neither is present', () => {
    expect(() => gameRecordFromPayload({ puzzle: { initialPly: 0, solution: [] }, game: {} })).toThrow(
      MalformedGameRecordError
    );
  });
});

describe('PositionResolverService.resolve', () => {
  it('replays initialPly + 1 plies under the last setup ply convention', () => {
    const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, 9, { convention: 'last-setup-ply' });

    expect(position.fen).toBe(ITALIAN_FEN);
    expect(position.sideToMove).toBe('white');
    expect(position.pliesApplied).toBe(10);
    expect(position.pliesRequested).toBe(10);
    expect(position.source).toBe('pgn');
  });

  it('replays exactly the offset under the first solution ply convention', () => {
    const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, 10, { convention: 'first-solution-ply' });

    expect(position.fen).toBe(ITALIAN_FEN);
    expect(position.pliesApplied).toBe(10);
  });

  it('lands one ply short when the offset is off by one', () => {
    const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, 8, { convention: 'last-setup-ply' });

    expect(position.pliesApplied).toBe(9);
    expect(position.sideToMove).toBe('black');
  });

  it('alternates the side to move with the number of plies applied', () => {
    for (let plies = 0; plies <= 10; plies++) {
      const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, plies, {
        convention: 'first-solution-ply',
      });
      expect(position.sideToMove).toBe(plies % 2 === 0 ? 'white' : 'black');
    }
  });

  it('returns the initial position for zero plies', () => {
    const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, 0, { convention: 'first-solution-ply' });

    expect(position.fen).toBe(START_FEN);
    expect(position.pliesApplied).toBe(0);
  });

  it('stops at the end of the game when the offset runs past it', () => {
    const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, 50, { convention: 'first-solution-ply' });

    expect(position.fen).toBe(ITALIAN_FEN);
    expect(position.pliesApplied).toBe(10);
    expect(position.pliesRequested).toBe(50);
  });

  it('matches a direct chess.js replay of the same moves', () => {
    const chess = new Chess();
    for (const san of ['e4', 'e5', 'Nf3', 'Nc6', 'Bc4']) chess.move(san);

    const position = resolver.resolve({ kind: 'pgn', pgn: ITALIAN_PGN }, 4, { convention: 'last-setup-ply' });
    expect(position.fen).toBe(chess.fen());
  });

  it('skips unreadable tokens when the PGN parser rejects the record', () => {
    const position = resolver.resolve({ kind: 'pgn', pgn: '1. e4 e5 2. Nf3 Qx9 Nc6' }, 4, {
      convention: 'first-solution-ply',
    });

    const chess = new Chess();
    for (const san of ['e4', 'e5', 'Nf3', 'Nc6']) chess.move(san);

    expect(position.source).toBe('token-scan');
    expect(position.skippedTokens).toEqual(['Qx9']);
    expect(position.pliesApplied).toBe(4);
    expect(position.fen).toBe(chess.fen());
    expect(position.sideToMove).toBe('white');
  });

  it('throws when no move can be replayed', () => {
    expect(() =>
      resolver.resolve({ kind: 'pgn', pgn: 'hello world' }, 3, { convention: 'first-solution-ply' })
    ).toThrow(MalformedGameRecordError);
  });

  it('throws on an empty game record', () => {
    expect(() => resolver.resolve({ kind: 'pgn', pgn: '  \n ' }, 0)).toThrow(MalformedGameRecordError);
  });

  it('uses a FEN record as is and ignores the offset', () => {
    const fen = '4k3/8/8/8/8/8/4P3/4K3 b - - 0 1';
    const position = resolver.resolve({ kind: 'fen', fen }, 7);

    expect(position.fen).toBe(fen);
    expect(position.sideToMove).toBe('black');
    expect(position.source).toBe('fen');
    expect(position.pliesApplied).toBe(0);
  });

  it('rejects an invalid FEN', () => {
    expect(() => resolver.resolve({ kind: 'fen', fen: 'not a fen' }, 0)).toThrow(MalformedGameRecordError);
  });
});
