/**
 * Zod validation schemas for API requests and pipeline settings
 */

import { z } from 'zod';

export const rankingMetricSchema = z.enum(['cp_loss', 'wp_swing']);
export const candidatePoolSchema = z.enum(['player', 'notable']);

const FEN_PATTERN = /^([pnbrqkPNBRQK1-8]{1,8}\/){7}[pnbrqkPNBRQK1-8]{1,8} [wb] (-|[KQkq]{1,4}) (-|[a-h][36]) \d+ \d+$/;

export const thresholdsSchema = z.object({
  inaccuracy: z.number().int().positive(),
  mistake: z.number().int().positive(),
  blunder: z.number().int().positive(),
});

export const analysisRequestSchema = z.object({
  username: z
    .string()
    .min(1, 'Username is required')
    .max(50)
    .regex(/^[A-Za-z0-9_-]+$/, 'Username may only contain letters, digits, "_" and "-"'),
  maxGames: z.number().int().min(1).max(200).default(10),
  depth: z.number().int().min(1).max(30).optional(),
  thresholds: thresholdsSchema.optional(),
  metric: rankingMetricSchema.optional(),
  candidatePool: candidatePoolSchema.optional(),
  chapterLimit: z.number().int().min(0).optional(),
  publish: z.boolean().default(false),
});

export type AnalysisRequestInput = z.infer<typeof analysisRequestSchema>;

export const positionRequestSchema = z.object({
  fen: z.string().regex(FEN_PATTERN, 'Invalid FEN'),
  depth: z.number().int().min(1).max(30).optional(),
});

export type PositionRequestInput = z.infer<typeof positionRequestSchema>;

export function validateRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}
