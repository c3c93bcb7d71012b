import { describe, it, expect } from 'vitest';
import { JsonFormatter, type Result } from '../../src/output/json-formatter';

describe('JsonFormatter', () => {
  it('collects chunks with their lengths and a summary', () => {
    const formatter = new JsonFormatter(
      'notes.txt',
      { strategy: 'recursive', maxSize: 4, overlap: 0, separators: [' ', ''], trim: false },
      6
    );
    formatter.addChunk({ content: 'ab ', startOffset: 0, endOffset: 3, index: 0 });
    formatter.addChunk({ content: 'c😀', startOffset: 3, endOffset: 6, index: 1 });

    const result: Result = formatter.toResult();

    expect(result.source).toBe('notes.txt');
    expect(result.options.strategy).toBe('recursive');
    expect(result.chunks).toEqual([
      { index: 0, content: 'ab ', startOffset: 0, endOffset: 3, length: 3 },
      { index: 1, content: 'c😀', startOffset: 3, endOffset: 6, length: 2 },
    ]);
    expect(result.summary).toEqual({ chunks: 2, characters: 6 });
  });

  it('serializes with two-space indentation', () => {
    const formatter = new JsonFormatter(
      '<stdin>',
      { strategy: 'fixed', maxSize: 10, overlap: 2, separators: [''], trim: true },
      0
    );
    const json = formatter.toJson();

    expect(json.startsWith('{\n  "source": "<stdin>",')).toBe(true);
    expect(JSON.parse(json)).toEqual(formatter.toResult());
  });
});
