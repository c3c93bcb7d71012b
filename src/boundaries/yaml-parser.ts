import * as YAML from 'yaml';
import { z } from 'zod';
import { CONFIG_SCHEMA, type Config } from '../schemas/config-schemas';
import { ValidationError, ProcessingError, handleUnknownError } from '../errors/index';
import { formatZodIssues } from './zod-issues';

export function parseYamlConfig(yamlContent: string): Config {
  let raw: unknown;

  try {
    const parsed: unknown = YAML.parse(yamlContent);
    raw = parsed ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    throw new ProcessingError(`Failed to parse YAML: ${err.message}`);
  }

  try {
    return CONFIG_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid configuration: ${formatZodIssues(e)}`);
    }
    const err = handleUnknownError(e, 'YAML validation');
    throw new ValidationError(`YAML validation failed: ${err.message}`);
  }
}
