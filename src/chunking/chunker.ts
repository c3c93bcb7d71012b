import type { Chunk, ChunkingOptions, ChunkingStrategy, TextPiece } from './types';
import type { ResolvedChunkingOptions } from '../schemas/chunking-schemas';
import { parseChunkingOptions } from '../boundaries/options-parser';
import { ChunkPacker, type PackedChunk } from './packer';
import { codePointLength, normalizeSeparators, splitKeepingSeparator } from './utils';

type WorkItem =
  | { kind: 'fragment'; text: string; start: number; level: number }
  | { kind: 'piece'; piece: TextPiece };

/*
 * Splits text along a separator hierarchy, coarsest boundary first.
 * Oversized pieces descend to the next separator through an explicit
 * worklist; the terminal "" separator guarantees every piece eventually fits.
 * All pieces, at whatever level, feed one greedy packer in source order.
 */
export class RecursiveChunker implements ChunkingStrategy {
  readonly name: string = 'recursive';

  chunk(content: string, options: ChunkingOptions = {}): Chunk[] {
    return Array.from(this.iterate(content, options));
  }

  split(content: string, options: ChunkingOptions = {}): string[] {
    return this.chunk(content, options).map((c) => c.content);
  }

  /**
   * Lazy variant of {@link chunk}. Options are validated before this returns;
   * each iteration recomputes the chunks from the start.
   */
  iterate(content: string, options: ChunkingOptions = {}): Iterable<Chunk> {
    const opts = this.resolveOptions(options);
    return {
      [Symbol.iterator]: () => generateChunks(content, opts),
    };
  }

  // Validated options with defaults applied, as this strategy will use them
  resolveOptions(options: ChunkingOptions = {}): ResolvedChunkingOptions {
    return parseChunkingOptions(options);
  }
}

function* generateChunks(content: string, opts: ResolvedChunkingOptions): Generator<Chunk> {
  let index = 0;
  for (const packed of packChunks(content, opts)) {
    const chunk = opts.trim ? trimChunk(packed) : packed;
    if (!chunk) continue;
    yield {
      content: chunk.content,
      startOffset: chunk.start,
      endOffset: chunk.end,
      index: index++,
    };
  }
}

function* packChunks(content: string, opts: ResolvedChunkingOptions): Generator<PackedChunk> {
  if (content.length === 0) return;

  if (codePointLength(content) <= opts.maxSize) {
    yield { content, start: 0, end: content.length };
    return;
  }

  const separators = normalizeSeparators(opts.separators);
  const packer = new ChunkPacker(opts.maxSize, opts.overlap);
  const work: WorkItem[] = [{ kind: 'fragment', text: content, start: 0, level: 0 }];

  let item: WorkItem | undefined;
  while ((item = work.pop()) !== undefined) {
    switch (item.kind) {
      case 'piece': {
        const emitted = packer.add(item.piece);
        if (emitted) yield emitted;
        break;
      }
      case 'fragment': {
        const expanded = expandFragment(item, separators, opts.maxSize);
        // Reverse push so the first piece is popped first
        for (let i = expanded.length - 1; i >= 0; i--) {
          const next = expanded[i];
          if (next) work.push(next);
        }
        break;
      }
    }
  }

  const last = packer.flush();
  if (last) yield last;
}

function expandFragment(
  fragment: { text: string; start: number; level: number },
  separators: readonly string[],
  maxSize: number
): WorkItem[] {
  const separator = separators[fragment.level] ?? '';
  const level = fragment.level + 1;

  if (separator !== '' && !fragment.text.includes(separator)) {
    return [{ kind: 'fragment', text: fragment.text, start: fragment.start, level }];
  }

  const items: WorkItem[] = [];
  for (const piece of splitKeepingSeparator(fragment.text, separator, fragment.start)) {
    if (codePointLength(piece.text) <= maxSize) {
      items.push({ kind: 'piece', piece });
    } else {
      items.push({ kind: 'fragment', text: piece.text, start: piece.start, level });
    }
  }
  return items;
}

function trimChunk(chunk: PackedChunk): PackedChunk | undefined {
  const content = chunk.content.trim();
  if (!content) return undefined;
  const leading = chunk.content.length - chunk.content.trimStart().length;
  const start = chunk.start + leading;
  return { content, start, end: start + content.length };
}
