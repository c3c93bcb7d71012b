import type { ChunkingOptions } from './types';
import type { ResolvedChunkingOptions } from '../schemas/chunking-schemas';
import { RecursiveChunker } from './chunker';

/*
 * Fixed windows of maxSize code points, advancing by maxSize - overlap.
 * Ignores any separators the caller passes.
 */
export class FixedChunker extends RecursiveChunker {
  readonly name: string = 'fixed';

  resolveOptions(options: ChunkingOptions = {}): ResolvedChunkingOptions {
    return { ...super.resolveOptions(options), separators: [''] };
  }
}
