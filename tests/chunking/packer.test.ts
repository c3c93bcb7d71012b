import { describe, it, expect } from 'vitest';
import { ChunkPacker } from '../../src/chunking/packer';

describe('ChunkPacker', () => {
  it('emits the buffer when the next piece would overflow', () => {
    const packer = new ChunkPacker(5, 0);

    expect(packer.add({ text: 'ab ', start: 0 })).toBeUndefined();
    expect(packer.add({ text: 'cd ', start: 3 })).toEqual({ content: 'ab ', start: 0, end: 3 });
    expect(packer.flush()).toEqual({ content: 'cd ', start: 3, end: 6 });
  });

  it('does not emit a buffer holding only the overlap seed', () => {
    const packer = new ChunkPacker(4, 2);

    packer.add({ text: 'abcd', start: 0 });
    expect(packer.flush()).toEqual({ content: 'abcd', start: 0, end: 4 });
    expect(packer.flush()).toBeUndefined();
  });

  it('starts the next chunk with the seed', () => {
    const packer = new ChunkPacker(4, 2);

    packer.add({ text: 'abcd', start: 0 });
    expect(packer.add({ text: 'e', start: 4 })).toEqual({ content: 'abcd', start: 0, end: 4 });
    expect(packer.flush()).toEqual({ content: 'cde', start: 2, end: 5 });
  });

  it('drops the seed entirely when the piece fills a chunk by itself', () => {
    const packer = new ChunkPacker(4, 3);

    packer.add({ text: 'ab', start: 0 });
    packer.add({ text: 'wxyz', start: 2 });
    expect(packer.flush()).toEqual({ content: 'wxyz', start: 2, end: 6 });
  });

  it('returns nothing when flushed empty', () => {
    expect(new ChunkPacker(3, 0).flush()).toBeUndefined();
  });
});
