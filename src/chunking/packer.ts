import type { TextPiece } from './types';
import { codePointLength, lastCodePoints } from './utils';

export interface PackedChunk {
  content: string;
  start: number;
  end: number;
}

/*
 * Greedy buffer shared by one chunking run. Pieces are appended until the
 * next one would overflow maxSize; the buffer is then emitted and restarted
 * from the last `overlap` code points of what was emitted (the seed).
 * Pieces must arrive in source order and be contiguous.
 */
export class ChunkPacker {
  private buffer = '';
  private bufferLength = 0;
  private bufferStart = 0;
  private seedLength = 0;

  constructor(
    private readonly maxSize: number,
    private readonly overlap: number
  ) {}

  add(piece: TextPiece): PackedChunk | undefined {
    const pieceLength = codePointLength(piece.text);
    let emitted: PackedChunk | undefined;

    if (this.bufferLength + pieceLength > this.maxSize) {
      emitted = this.emit();
      if (this.bufferLength + pieceLength > this.maxSize) {
        this.reseed(lastCodePoints(this.buffer, this.maxSize - pieceLength));
      }
    }

    if (this.bufferLength === 0) this.bufferStart = piece.start;
    this.buffer += piece.text;
    this.bufferLength += pieceLength;
    return emitted;
  }

  // Emits whatever was added since the last chunk; a bare seed is kept.
  flush(): PackedChunk | undefined {
    return this.emit();
  }

  private emit(): PackedChunk | undefined {
    if (this.bufferLength <= this.seedLength) return undefined;

    const chunk: PackedChunk = {
      content: this.buffer,
      start: this.bufferStart,
      end: this.bufferStart + this.buffer.length,
    };
    this.reseed(lastCodePoints(this.buffer, this.overlap));
    return chunk;
  }

  private reseed(seed: string): void {
    this.bufferStart += this.buffer.length - seed.length;
    this.buffer = seed;
    this.bufferLength = codePointLength(seed);
    this.seedLength = this.bufferLength;
  }
}
