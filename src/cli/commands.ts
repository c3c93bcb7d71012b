import type { Command } from 'commander';
import { createChunker } from '../chunking/chunker-factory';
import { FixedChunker } from '../chunking/fixed-chunker';
import { codePointLength } from '../chunking/utils';
import {
  loadConfig,
  parseCliOptions,
  parseEnvironment,
  readInput,
  resolveChunkingOptions,
} from '../boundaries/index';
import { DEFAULT_MAX_SIZE } from '../config/constants';
import { handleUnknownError } from '../errors/index';
import { JsonFormatter } from '../output/json-formatter';
import { debug, error, setSilentMode, setVerboseMode, warn } from '../output/logger';
import { formatChunks, formatSummary } from '../output/reporter';
import { withTiming } from '../output/timing';
import { OutputFormat, type ExecuteChunkOptions } from './types';

/*
 * Registers the chunking command with Commander.
 * It is the program's default command: `chunkwise [file]`.
 */
export function registerMainCommand(program: Command): void {
  program
    .option('-m, --max-size <size>', `Maximum characters per chunk (default: ${DEFAULT_MAX_SIZE})`)
    .option('-o, --overlap <size>', 'Characters repeated from the end of the previous chunk (default: 0)')
    .option('-s, --separator <value...>', 'Separators to try, coarsest first (escapes: \\n \\r \\t \\\\)')
    .option('--strategy <name>', 'Chunking strategy: recursive (default) or fixed')
    .option('--trim', 'Trim whitespace at chunk edges and drop empty chunks')
    .option('--output <format>', 'Output format: line (default) or json', 'line')
    .option('--config <path>', 'Path to a custom .chunkwise.yaml config file')
    .option('-v, --verbose', 'Enable verbose logging')
    .argument('[file]', 'file to chunk (reads stdin when omitted or "-")')
    .action((file: string | undefined) => {
      try {
        const output = executeChunk(file, program.opts());
        process.stdout.write(`${output}\n`);
      } catch (e: unknown) {
        const err = handleUnknownError(e, 'Chunking input');
        error(`Error: ${err.message}`);
        process.exit(1);
      }
    });
}

/**
 * Resolves options, reads the input and renders its chunks in the requested
 * output format. Throws on any invalid option or unreadable input.
 */
export function executeChunk(
  file: string | undefined,
  rawOptions: unknown,
  { cwd = process.cwd(), env = process.env }: ExecuteChunkOptions = {}
): string {
  const cli = parseCliOptions(rawOptions);
  setSilentMode(cli.output === OutputFormat.Json);
  setVerboseMode(cli.verbose);

  const run = resolveChunkingOptions({
    cli,
    env: parseEnvironment(env),
    config: loadConfig(cwd, cli.config),
  });
  const chunker = createChunker(run.strategy);
  if (chunker instanceof FixedChunker && run.chunking.separators !== undefined) {
    warn('Warning: separators are ignored by the fixed strategy');
  }
  const resolved = chunker.resolveOptions(run.chunking);

  const input = readInput(file, cwd);
  const characters = codePointLength(input.text);
  debug(`Chunking ${input.source} (${characters} chars) with the ${chunker.name} strategy, maxSize=${resolved.maxSize}, overlap=${resolved.overlap}`);

  const chunks = withTiming(`${chunker.name} chunking`, () => chunker.chunk(input.text, resolved));

  if (cli.output === OutputFormat.Json) {
    const formatter = new JsonFormatter(input.source, { strategy: run.strategy, ...resolved }, characters);
    for (const chunk of chunks) formatter.addChunk(chunk);
    return formatter.toJson();
  }

  const summary = formatSummary(input.source, chunks, characters);
  return chunks.length > 0 ? `${summary}\n\n${formatChunks(chunks)}` : summary;
}
