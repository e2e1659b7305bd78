import { z } from 'zod';
import { CommonRunSchema } from './commonSchemas';

export const SeedSchema = CommonRunSchema.extend({
  scale: z.coerce.number().int().positive().default(1),
  size: z.coerce.number().int().positive().optional(),
});

export type SeedInput = z.infer<typeof SeedSchema>;
