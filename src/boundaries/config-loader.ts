import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { Config } from '../schemas/config-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';
import { DEFAULT_CONFIG_FILENAME } from '../config/constants';
import { parseYamlConfig } from './yaml-parser';

/**
 * Load and validate configuration from .chunkwise.yaml.
 * The default file is optional; an explicitly named one must exist.
 */
export function loadConfig(cwd: string = process.cwd(), configPath?: string): Config {
  const filePath = configPath
    ? path.resolve(cwd, configPath)
    : path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

  if (!existsSync(filePath)) {
    if (configPath) {
      throw new ConfigError(`Missing configuration file at ${filePath}`);
    }
    return {};
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading config file');
    throw new ConfigError(`Failed to read config file: ${err.message}`);
  }

  return parseYamlConfig(content);
}
