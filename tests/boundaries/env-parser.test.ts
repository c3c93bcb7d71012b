import { describe, it, expect } from 'vitest';
import { parseEnvironment } from '../../src/boundaries/env-parser';
import { ValidationError } from '../../src/errors/index';

describe('Environment Parser', () => {
  it('accepts an environment without chunkwise variables', () => {
    expect(parseEnvironment({ PATH: '/usr/bin' })).toEqual({});
  });

  it('coerces size variables', () => {
    const env = {
      CHUNKWISE_MAX_SIZE: '500',
      CHUNKWISE_OVERLAP: '50',
      HOME: '/home/test',
    };

    expect(parseEnvironment(env)).toEqual({ CHUNKWISE_MAX_SIZE: 500, CHUNKWISE_OVERLAP: 50 });
  });

  it('rejects invalid values', () => {
    expect(() => parseEnvironment({ CHUNKWISE_MAX_SIZE: 'zero' })).toThrow(ValidationError);
    expect(() => parseEnvironment({ CHUNKWISE_OVERLAP: '-3' })).toThrow(/CHUNKWISE_OVERLAP/);
  });
});
