/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.chunkwise.yaml';

export const DEFAULT_MAX_SIZE = 1000;
export const DEFAULT_OVERLAP = 0;

// Coarsest boundary first; "" is the split-anywhere fallback.
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', '! ', '? ', '; ', ', ', ' ', ''];

export const CLI_VERSION = '1.0.0';
