import { z } from 'zod';
import { CommonRunSchema, DecimalListSchema, IntListSchema } from './commonSchemas';

export const SensitivitySchema = CommonRunSchema.extend({
  size: z.coerce.number().int().positive().optional(),
  sizes: IntListSchema.optional(),
  thresholds: DecimalListSchema.optional(),
  reference: z.coerce.number().min(0).max(4).optional(),
});

export type SensitivityInput = z.infer<typeof SensitivitySchema>;
