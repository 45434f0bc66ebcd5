import { z } from 'zod';

export const outputFormatSchema = z.enum(['table', 'json', 'csv']).default('table');

/**
 * Options every file-based command takes
 */
export const fileCommandSchema = z.object({
  file: z.string().min(1, 'Bar file path is required'),
  format: outputFormatSchema,
});

export const windowOptionSchema = z
  .number({ invalid_type_error: 'Window must be a number' })
  .int('Window must be an integer')
  .positive('Window must be positive');
