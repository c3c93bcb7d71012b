import { z } from 'zod';
import { CHUNKING_OPTIONS_SCHEMA, type ResolvedChunkingOptions } from '../schemas/chunking-schemas';
import { InvalidArgumentError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './zod-issues';

export function parseChunkingOptions(raw: unknown): ResolvedChunkingOptions {
  try {
    return CHUNKING_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new InvalidArgumentError(`Invalid chunking options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'Chunking option parsing');
    throw new InvalidArgumentError(`Chunking option parsing failed: ${err.message}`);
  }
}
