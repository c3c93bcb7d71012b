import { describe, it, expect, vi, afterEach } from 'vitest';
import { debug, error, setSilentMode, setVerboseMode, warn } from '../../src/output/logger';
import { withTiming } from '../../src/output/timing';

describe('logger', () => {
  afterEach(() => {
    setSilentMode(false);
    setVerboseMode(false);
    vi.restoreAllMocks();
  });

  it('silences warn but never error', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    setSilentMode(true);
    warn('hidden');
    error('shown');

    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('shown');
  });

  it('prints debug lines only in verbose mode', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    debug('quiet');
    setVerboseMode(true);
    debug('loud');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith('[chunkwise] loud');
  });

  it('keeps debug lines out of silent output', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    setVerboseMode(true);
    setSilentMode(true);
    debug('hidden');

    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe('withTiming', () => {
  afterEach(() => {
    setVerboseMode(false);
    vi.restoreAllMocks();
  });

  it('returns the result and reports the elapsed time', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setVerboseMode(true);

    expect(withTiming('sum', () => 1 + 2)).toBe(3);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0]?.[0]).toMatch(/^\[chunkwise\] Time taken by sum: \d+\.\d{4} seconds$/);
  });
});
