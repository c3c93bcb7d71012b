import type { TextPiece } from './types';

export function codePointLength(text: string): number {
  let length = 0;
  for (const _char of text) length++;
  return length;
}

export function lastCodePoints(text: string, count: number): string {
  if (count <= 0) return '';
  const chars = Array.from(text);
  return chars.slice(Math.max(0, chars.length - count)).join('');
}

/**
 * Splits on every occurrence of `separator`, keeping each separator on the
 * end of the piece before it, so joining the pieces gives back `text`.
 * An empty separator splits between code points.
 */
export function splitKeepingSeparator(text: string, separator: string, offset = 0): TextPiece[] {
  if (separator === '') return splitCodePoints(text, offset);

  const pieces: TextPiece[] = [];
  let start = 0;
  let at = text.indexOf(separator);
  while (at !== -1) {
    const end = at + separator.length;
    pieces.push({ text: text.slice(start, end), start: offset + start });
    start = end;
    at = text.indexOf(separator, start);
  }
  if (start < text.length) {
    pieces.push({ text: text.slice(start), start: offset + start });
  }
  return pieces;
}

export function splitCodePoints(text: string, offset = 0): TextPiece[] {
  const pieces: TextPiece[] = [];
  let position = offset;
  for (const char of text) {
    pieces.push({ text: char, start: position });
    position += char.length;
  }
  return pieces;
}

/**
 * Drops duplicates and anything after the split-anywhere separator "",
 * appending "" when the caller left it out.
 */
export function normalizeSeparators(separators: readonly string[]): string[] {
  const result: string[] = [];
  for (const separator of separators) {
    if (result.includes(separator)) continue;
    result.push(separator);
    if (separator === '') return result;
  }
  result.push('');
  return result;
}
