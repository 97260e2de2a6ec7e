/**
 * UCI move notation helpers
 *
 * Examples:
 * - e2e4
 * - e7e8q (promotion)
 */

export type PromotionPiece = 'q' | 'r' | 'b' | 'n';

export interface ParsedUciMove {
  from: string;
  to: string;
  promotion?: PromotionPiece;
}

const UCI_PATTERN = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

function isPromotionPiece(value: string): value is PromotionPiece {
  return value === 'q' || value === 'r' || value === 'b' || value === 'n';
}

export function parseUciMove(text: string): ParsedUciMove | null {
  const match = UCI_PATTERN.exec(text.trim().toLowerCase());
  if (!match) return null;

  const [, from, to, promo] = match;
  if (promo !== undefined && isPromotionPiece(promo)) {
    return { from, to, promotion: promo };
  }
  return { from, to };
}
