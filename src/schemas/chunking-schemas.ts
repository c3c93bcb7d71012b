import { z } from 'zod';
import { DEFAULT_MAX_SIZE, DEFAULT_OVERLAP, DEFAULT_SEPARATORS } from '../config/constants';

export const CHUNKING_STRATEGY_SCHEMA = z.enum(['recursive', 'fixed']);

// Options accepted by every chunking strategy
export const CHUNKING_OPTIONS_SCHEMA = z
  .object({
    maxSize: z.number().int().positive().default(DEFAULT_MAX_SIZE),
    overlap: z.number().int().nonnegative().default(DEFAULT_OVERLAP),
    separators: z.array(z.string()).default(() => [...DEFAULT_SEPARATORS]),
    trim: z.boolean().default(false),
  })
  .refine((opts) => opts.overlap < opts.maxSize, {
    message: 'overlap must be smaller than maxSize',
    path: ['overlap'],
  });

// Inferred types
export type ResolvedChunkingOptions = z.infer<typeof CHUNKING_OPTIONS_SCHEMA>;
export type ChunkingStrategyName = z.infer<typeof CHUNKING_STRATEGY_SCHEMA>;
