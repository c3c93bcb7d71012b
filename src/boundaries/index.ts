export { parseChunkingOptions } from './options-parser';
export { parseCliOptions, decodeSeparator } from './cli-parser';
export { parseEnvironment } from './env-parser';
export { loadConfig } from './config-loader';
export { readInput, STDIN_SOURCE, type InputText } from './input-reader';
export { resolveChunkingOptions, type OptionSources, type RunOptions } from './options-resolver';
