export interface Chunk {
  content: string;
  startOffset: number; // UTF-16 index into the source text
  endOffset: number;
  index: number;
}

export interface ChunkingOptions {
  maxSize?: number; // Maximum code points per chunk
  overlap?: number; // Code points repeated from the previous chunk
  separators?: readonly string[]; // Coarsest first; "" is always appended
  trim?: boolean; // Strip whitespace at chunk edges and drop empty chunks
}

export interface ChunkingStrategy {
  readonly name: string;
  chunk(content: string, options?: ChunkingOptions): Chunk[];
}

// A contiguous slice of the source text, with its absolute start
export interface TextPiece {
  text: string;
  start: number;
}
