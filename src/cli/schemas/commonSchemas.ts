import { z } from 'zod';
import { ThresholdSchema } from '../../core/config';

function splitList(s: string): string[] {
  return s.split(',').map((p) => p.trim()).filter(Boolean);
}

/** "10,100,1000" -> [10, 100, 1000] */
export const IntListSchema = z
  .string()
  .trim()
  .regex(/^\d+(\s*,\s*\d+)*$/, 'Expected a comma-separated list of positive integers')
  .transform((s) => splitList(s).map(Number))
  .refine((list) => list.every((n) => Number.isInteger(n) && n > 0), 'Values must be positive integers');

/** "0.3,0.4,0.5" -> [0.3, 0.4, 0.5] */
export const DecimalListSchema = z
  .string()
  .trim()
  .regex(/^\d*\.?\d+(\s*,\s*\d*\.?\d+)*$/, 'Expected a comma-separated list of numbers')
  .transform((s) => splitList(s).map(Number));

export const CommonRunSchema = z.object({
  results: z.string().trim().min(1).optional(),
  store: z.enum(['lancedb', 'memory']).optional(),
  corpus: z.string().trim().min(1).optional(),
  queries: z.string().trim().min(1).optional(),
});

export const OptionalThresholdSchema = ThresholdSchema.optional();

export type CommonRunInput = z.infer<typeof CommonRunSchema>;
