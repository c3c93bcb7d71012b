import { RecursiveChunker } from './chunker';
import { FixedChunker } from './fixed-chunker';
import { CHUNKING_STRATEGY_SCHEMA } from '../schemas/chunking-schemas';
import { InvalidArgumentError } from '../errors/index';

/**
 * Creates the chunking strategy registered under `name`.
 * @throws InvalidArgumentError for an unknown strategy name
 */
export function createChunker(name: string = 'recursive'): RecursiveChunker {
  const parsed = CHUNKING_STRATEGY_SCHEMA.safeParse(name);
  if (!parsed.success) {
    const available = CHUNKING_STRATEGY_SCHEMA.options.join(', ');
    throw new InvalidArgumentError(`Unknown chunking strategy: '${name}'. Available strategies: ${available}`);
  }

  switch (parsed.data) {
    case 'recursive':
      return new RecursiveChunker();
    case 'fixed':
      return new FixedChunker();
  }
}
