import { z } from 'zod';
import { fileCommandSchema, windowOptionSchema } from './shared.js';

/**
 * Simple moving average schema
 */
export const indicatorsSmaSchema = fileCommandSchema.extend({
  window: windowOptionSchema,
});

export type IndicatorsSmaArgs = z.infer<typeof indicatorsSmaSchema>;
