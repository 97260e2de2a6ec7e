/**
 * Zod validation schemas for puzzle payloads and API requests
 */

import { z } from 'zod';

export const rawPuzzlePayloadSchema = z
  .object({
    puzzle: z.object({
      id: z.string().min(1).max(64).optional(),
      initialPly: z.number().int().min(0),
      solution: z.array(z.string().min(1).max(8)).max(64),
      rating: z.number().int().optional(),
      themes: z.array(z.string()).optional(),
    }),
    game: z.object({
      id: z.string().optional(),
      pgn: z.string().max(50000, 'PGN is too long').optional(),
      fen: z.string().max(100).optional(),
    }),
  })
  .refine((payload) => Boolean(payload.game.pgn?.trim() || payload.game.fen?.trim()), {
    message: 'game.pgn or game.fen is required',
    path: ['game'],
  });

export const importRequestSchema = z
  .object({
    payload: rawPuzzlePayloadSchema.optional(),
  })
  .strict();

export type ImportRequestInput = z.infer<typeof importRequestSchema>;

// Retention always runs against server time; the body carries no options
export const retentionRequestSchema = z.object({}).strict();

export function validateRequest<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): { success: true; data: T } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}
