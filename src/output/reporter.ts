import chalk from 'chalk';
import stripAnsi from 'strip-ansi';
import type { Chunk } from '../chunking/types';
import { codePointLength } from '../chunking/utils';

export function formatChunkHeader(chunk: Chunk, total: number): string {
  const position = chalk.cyan(`chunk ${chunk.index + 1}/${total}`);
  const span = chalk.dim(`[${chunk.startOffset}-${chunk.endOffset}]`);
  return `${position}  ${span}  ${codePointLength(chunk.content)} chars`;
}

// Rule drawn as wide as the visible header text
function underline(header: string): string {
  return chalk.dim('-'.repeat(stripAnsi(header).length));
}

export function formatChunks(chunks: Chunk[]): string {
  return chunks
    .map((chunk) => {
      const header = formatChunkHeader(chunk, chunks.length);
      return `${header}\n${underline(header)}\n${chunk.content}`;
    })
    .join('\n\n');
}

export function formatSummary(source: string, chunks: Chunk[], characters: number): string {
  const noun = chunks.length === 1 ? 'chunk' : 'chunks';
  return `${chalk.bold(source)}: ${chunks.length} ${noun} from ${characters} characters`;
}
