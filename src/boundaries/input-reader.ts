import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { ProcessingError, handleUnknownError } from '../errors/index';

export const STDIN_SOURCE = '<stdin>';

export interface InputText {
  source: string;
  text: string;
}

/*
 * Reads the text to chunk from a file, or from stdin when no file (or "-")
 * is given.
 */
export function readInput(file?: string, cwd: string = process.cwd()): InputText {
  if (!file || file === '-') {
    return { source: STDIN_SOURCE, text: readFileSync(0, 'utf-8') };
  }

  const fullPath = path.resolve(cwd, file);
  if (!existsSync(fullPath)) {
    throw new ProcessingError(`Input file not found: ${file}`);
  }

  try {
    return { source: file, text: readFileSync(fullPath, 'utf-8') };
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading input file');
    throw new ProcessingError(`Failed to read ${file}: ${err.message}`);
  }
}
