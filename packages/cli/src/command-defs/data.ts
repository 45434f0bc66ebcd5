import { z } from 'zod';
import { fileCommandSchema } from './shared.js';

/**
 * Bar file inspection schema
 */
export const dataInspectSchema = fileCommandSchema;

export type DataInspectArgs = z.infer<typeof dataInspectSchema>;
