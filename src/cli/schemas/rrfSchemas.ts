import { z } from 'zod';
import { CommonRunSchema, IntListSchema, OptionalThresholdSchema } from './commonSchemas';

export const RrfSchema = CommonRunSchema.extend({
  size: z.coerce.number().int().positive().optional(),
  sizes: IntListSchema.optional(),
  k: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().positive().optional(),
  channelLimit: z.coerce.number().int().positive().optional(),
  threshold: OptionalThresholdSchema,
});

export type RrfInput = z.infer<typeof RrfSchema>;
