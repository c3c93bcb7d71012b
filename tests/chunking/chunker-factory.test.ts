import { describe, it, expect } from 'vitest';
import { createChunker } from '../../src/chunking/chunker-factory';
import { FixedChunker } from '../../src/chunking/fixed-chunker';
import { RecursiveChunker } from '../../src/chunking/chunker';
import { InvalidArgumentError } from '../../src/errors/index';

describe('createChunker', () => {
  it('creates the recursive strategy by default', () => {
    const chunker = createChunker();
    expect(chunker).toBeInstanceOf(RecursiveChunker);
    expect(chunker.name).toBe('recursive');
  });

  it('creates the fixed strategy', () => {
    const chunker = createChunker('fixed');
    expect(chunker).toBeInstanceOf(FixedChunker);
    expect(chunker.name).toBe('fixed');
  });

  it('rejects unknown strategies', () => {
    expect(() => createChunker('semantic')).toThrow(InvalidArgumentError);
    expect(() => createChunker('semantic')).toThrow(
      "Unknown chunking strategy: 'semantic'. Available strategies: recursive, fixed"
    );
  });
});

describe('FixedChunker', () => {
  const chunker = new FixedChunker();

  it('ignores separators and cuts fixed windows', () => {
    expect(chunker.split('one two three', { maxSize: 5, separators: [' '] })).toEqual(['one t', 'wo th', 'ree']);
  });

  it('advances by maxSize minus overlap', () => {
    expect(chunker.split('one two three', { maxSize: 5, overlap: 1 })).toEqual(['one t', 'two t', 'three']);
  });

  it('reports its forced separators', () => {
    expect(chunker.resolveOptions({ maxSize: 5 }).separators).toEqual(['']);
  });

  it('still validates options', () => {
    expect(() => chunker.split('abc', { maxSize: 3, overlap: 3 })).toThrow(InvalidArgumentError);
  });
});
