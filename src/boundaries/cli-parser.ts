import { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, type CliOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './zod-issues';

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
};

/**
 * Decodes the escapes a shell user types for separators: `\n`, `\r`, `\t`, `\\`.
 * Any other backslash sequence is left as written.
 */
export function decodeSeparator(value: string): string {
  return value.replace(/\\([nrt\\])/g, (match: string, code: string) => ESCAPES[code] ?? match);
}

export function parseCliOptions(raw: unknown): CliOptions {
  let options: CliOptions;
  try {
    options = CLI_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid CLI options: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`);
  }

  if (options.separator === undefined) return options;
  return { ...options, separator: options.separator.map(decodeSeparator) };
}
