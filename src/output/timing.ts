import { debug } from './logger';

/*
 * Runs fn and reports its wall-clock time as a verbose diagnostic.
 */
export function withTiming<T>(label: string, fn: () => T): T {
  const start = performance.now();
  const result = fn();
  const seconds = (performance.now() - start) / 1000;
  debug(`Time taken by ${label}: ${seconds.toFixed(4)} seconds`);
  return result;
}
