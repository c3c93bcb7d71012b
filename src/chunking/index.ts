import { RecursiveChunker } from './chunker';
import type { ChunkingOptions } from './types';

export { RecursiveChunker } from './chunker';
export { FixedChunker } from './fixed-chunker';
export { createChunker } from './chunker-factory';
export { normalizeSeparators } from './utils';
export type { Chunk, ChunkingOptions, ChunkingStrategy } from './types';
export type { ChunkingStrategyName, ResolvedChunkingOptions } from '../schemas/chunking-schemas';
export { DEFAULT_MAX_SIZE, DEFAULT_OVERLAP, DEFAULT_SEPARATORS } from '../config/constants';
export { ChunkwiseError, InvalidArgumentError } from '../errors/index';

/**
 * Splits `text` into chunks of at most `maxSize` code points, preferring the
 * coarsest separator that works. Returns `[]` for empty input.
 * @throws InvalidArgumentError when the options are out of range
 */
export function split(text: string, options: ChunkingOptions = {}): string[] {
  return new RecursiveChunker().split(text, options);
}
