import type { RawPuzzlePayload } from '../types/puzzle.types.js';

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

// Italian game, 10 plies; both sides can still castle short
export const ITALIAN_PGN = '1. e4 e5 2. Nf3 Nc6 3. Bc4 Bc5 4. d3 Nf6 5. Nc3 d6';
export const ITALIAN_FEN = 'r1bqk2r/ppp2ppp/2np1n2/2b1p3/2B1P3/2NP1N2/PPP2PPP/R1BQK2R w KQkq - 0 6';

// Six plies into the scholar's mate, Qxf7 is mate
export const SCHOLAR_PGN = '1. e4 e5 2. Qh5 Nc6 3. Bc4 Nf6';

export function italianCastlePayload(id = 'castle1'): RawPuzzlePayload {
  return {
    puzzle: { id, initialPly: 9, solution: ['e1g1'], rating: 1500, themes: ['opening'] },
    game: { id: 'game1', pgn: ITALIAN_PGN },
  };
}

export function scholarMatePayload(id = 'mate1'): RawPuzzlePayload {
  return {
    puzzle: { id, initialPly: 5, solution: ['h5f7'] },
    game: { pgn: SCHOLAR_PGN },
  };
}

// Eight legal half-moves from the start, one more full move than allowed
export function longSolutionPayload(id = 'long1'): RawPuzzlePayload {
  return {
    puzzle: {
      id,
      initialPly: 0,
      solution: ['e2e4', 'e7e5', 'g1f3', 'b8c6', 'f1c4', 'g8f6', 'd2d3', 'f8c5'],
    },
    game: { fen: START_FEN },
  };
}
