import { z } from 'zod';
import { CHUNKING_STRATEGY_SCHEMA } from './chunking-schemas';

// Configuration file schema for .chunkwise.yaml validation
export const CONFIG_SCHEMA = z
  .object({
    maxSize: z.number().int().positive().optional(),
    overlap: z.number().int().nonnegative().optional(),
    separators: z.array(z.string()).optional(),
    trim: z.boolean().optional(),
    strategy: CHUNKING_STRATEGY_SCHEMA.optional(),
  })
  .strict();

// Inferred types
export type Config = z.infer<typeof CONFIG_SCHEMA>;
