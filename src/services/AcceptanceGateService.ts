/**
 * AcceptanceGateService
 * Decides whether a converted solution is short enough to publish.
 */

import { config } from '../config/index.js';
import type { AcceptanceDecision } from '../types/puzzle.types.js';

export interface AcceptanceOptions {
  maxFullMoves?: number;
  minHalfMoves?: number;
}

export function fullMoveCount(halfMoves: number): number {
  return Math.ceil(halfMoves / 2);
}

export class AcceptanceGateService {
  private readonly maxFullMoves: number;
  private readonly minHalfMoves: number;

  constructor(options: AcceptanceOptions = {}) {
    this.maxFullMoves = options.maxFullMoves ?? config.maxSolutionFullMoves;
    this.minHalfMoves = options.minHalfMoves ?? config.minSolutionHalfMoves;
  }

  evaluate(sanMoves: readonly string[]): AcceptanceDecision {
    const halfMoves = sanMoves.length;
    const fullMoves = fullMoveCount(halfMoves);

    if (halfMoves === 0) {
      return { accepted: false, reason: 'empty', fullMoves, halfMoves };
    }
    if (halfMoves < this.minHalfMoves) {
      return { accepted: false, reason: 'too-short', fullMoves, halfMoves };
    }
    if (fullMoves > this.maxFullMoves) {
      return { accepted: false, reason: 'too-long', fullMoves, halfMoves };
    }

    return { accepted: true, fullMoves };
  }

  reasonText(decision: AcceptanceDecision): string {
    if (decision.accepted) {
      return `Solution accepted (${decision.fullMoves} full moves)`;
    }

    switch (decision.reason) {
      case 'empty':
        return 'Solution is empty';
      case 'too-short':
        return `Solution has ${decision.halfMoves} half-moves, fewer than the required ${this.minHalfMoves}`;
      case 'too-long':
        return `Solution has ${decision.halfMoves} half-moves, more than ${this.maxFullMoves} full moves`;
    }
  }

  get limits(): Required<AcceptanceOptions> {
    return { maxFullMoves: this.maxFullMoves, minHalfMoves: this.minHalfMoves };
  }
}

// Singleton instance
export const acceptanceGateService = new AcceptanceGateService();
