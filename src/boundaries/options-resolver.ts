import type { ChunkingOptions } from '../chunking/types';
import type { ChunkingStrategyName } from '../schemas/chunking-schemas';
import type { CliOptions } from '../schemas/cli-schemas';
import type { Config } from '../schemas/config-schemas';
import type { EnvConfig } from '../schemas/env-schemas';

export interface OptionSources {
  cli: CliOptions;
  env: EnvConfig;
  config: Config;
}

export interface RunOptions {
  strategy: ChunkingStrategyName;
  chunking: ChunkingOptions;
}

/*
 * Merges option sources per key: CLI flags, then environment, then the
 * config file. Keys left unset fall through to the chunker's defaults.
 */
export function resolveChunkingOptions({ cli, env, config }: OptionSources): RunOptions {
  const maxSize = cli.maxSize ?? env.CHUNKWISE_MAX_SIZE ?? config.maxSize;
  const overlap = cli.overlap ?? env.CHUNKWISE_OVERLAP ?? config.overlap;
  const separators = cli.separator ?? config.separators;
  const trim = cli.trim ?? config.trim;

  return {
    strategy: cli.strategy ?? config.strategy ?? 'recursive',
    chunking: {
      ...(maxSize !== undefined && { maxSize }),
      ...(overlap !== undefined && { overlap }),
      ...(separators !== undefined && { separators }),
      ...(trim !== undefined && { trim }),
    },
  };
}
