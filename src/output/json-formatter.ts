import type { Chunk } from '../chunking/types';
import { codePointLength } from '../chunking/utils';
import type { ChunkingStrategyName, ResolvedChunkingOptions } from '../schemas/chunking-schemas';

export interface JsonChunk {
  index: number;
  content: string;
  startOffset: number;
  endOffset: number;
  length: number;
}

export interface JsonOptions extends ResolvedChunkingOptions {
  strategy: ChunkingStrategyName;
}

export interface Result {
  source: string;
  options: JsonOptions;
  chunks: JsonChunk[];
  summary: {
    chunks: number;
    characters: number;
  };
}

export class JsonFormatter {
  private chunks: JsonChunk[] = [];

  constructor(
    private readonly source: string,
    private readonly options: JsonOptions,
    private readonly characters: number
  ) {}

  addChunk(chunk: Chunk): void {
    this.chunks.push({
      index: chunk.index,
      content: chunk.content,
      startOffset: chunk.startOffset,
      endOffset: chunk.endOffset,
      length: codePointLength(chunk.content),
    });
  }

  toResult(): Result {
    return {
      source: this.source,
      options: this.options,
      chunks: this.chunks,
      summary: {
        chunks: this.chunks.length,
        characters: this.characters,
      },
    };
  }

  toJson(): string {
    return JSON.stringify(this.toResult(), null, 2);
  }
}
