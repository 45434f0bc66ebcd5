import { z } from 'zod';
import { fileCommandSchema, windowOptionSchema } from './shared.js';

/**
 * Shared by `strategy performance` and `strategy signals`
 *
 * Omitted windows fall back to CROSSBAR_SHORT_WINDOW / CROSSBAR_LONG_WINDOW.
 */
export const strategyRunSchema = fileCommandSchema.extend({
  shortWindow: windowOptionSchema.optional(),
  longWindow: windowOptionSchema.optional(),
});

export type StrategyRunArgs = z.infer<typeof strategyRunSchema>;

/**
 * Strategy performance schema
 */
export const strategyPerformanceSchema = strategyRunSchema;

export type StrategyPerformanceArgs = z.infer<typeof strategyPerformanceSchema>;

/**
 * Strategy signals schema
 */
export const strategySignalsSchema = strategyRunSchema;

export type StrategySignalsArgs = z.infer<typeof strategySignalsSchema>;
