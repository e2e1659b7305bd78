import { z } from 'zod';
import { CommonRunSchema, OptionalThresholdSchema } from './commonSchemas';

export const ChannelsSchema = CommonRunSchema.extend({
  size: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().optional(),
  threshold: OptionalThresholdSchema,
});

export type ChannelsInput = z.infer<typeof ChannelsSchema>;
