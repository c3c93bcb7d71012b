// Every chunkwise failure carries a stable `code` for scripted callers
export class ChunkwiseError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ChunkwiseError';
  }
}

// Chunking was called with options it cannot honour (size, overlap, strategy)
export class InvalidArgumentError extends ChunkwiseError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

// CLI flags, CHUNKWISE_* variables or .chunkwise.yaml keys failed their schema
export class ValidationError extends ChunkwiseError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// An explicit --config path that does not exist or cannot be read
export class ConfigError extends ChunkwiseError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

// Input text or YAML that could not be read or parsed
export class ProcessingError extends ChunkwiseError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Normalizes a thrown value; non-Error values are wrapped with `context`
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
