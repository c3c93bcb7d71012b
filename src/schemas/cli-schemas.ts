import { z } from 'zod';
import { OutputFormat } from '../cli/types';
import { CHUNKING_STRATEGY_SCHEMA } from './chunking-schemas';

// CLI options schema for command line argument validation.
// Numbers arrive from commander as strings.
export const CLI_OPTIONS_SCHEMA = z.object({
  maxSize: z.coerce.number().int().positive().optional(),
  overlap: z.coerce.number().int().nonnegative().optional(),
  separator: z.array(z.string()).optional(),
  strategy: CHUNKING_STRATEGY_SCHEMA.optional(),
  trim: z.boolean().optional(),
  output: z.nativeEnum(OutputFormat).default(OutputFormat.Line),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
