import { z } from 'zod';
import { CommonRunSchema, IntListSchema, OptionalThresholdSchema } from './commonSchemas';

export const RerankSchema = CommonRunSchema.extend({
  scale: z.coerce.number().int().positive().default(1),
  scales: IntListSchema.optional(),
  k: z.coerce.number().int().min(0).optional(),
  candidates: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().optional(),
  channelLimit: z.coerce.number().int().positive().optional(),
  threshold: OptionalThresholdSchema,
}).refine((v) => v.candidates === undefined || v.limit === undefined || v.candidates >= v.limit, {
  message: 'candidates must be >= limit',
  path: ['candidates'],
});

export type RerankInput = z.infer<typeof RerankSchema>;
