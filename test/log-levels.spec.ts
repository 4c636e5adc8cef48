import { describe, expect, it } from 'vitest';
import { resolveLogLevels } from '../apps/worker/src/log-levels';

describe('resolveLogLevels', () => {
  it('enables every level up to the configured one', () => {
    expect(resolveLogLevels('debug')).toEqual(['fatal', 'error', 'warn', 'log', 'debug']);
    expect(resolveLogLevels('fatal')).toEqual(['fatal']);
  });

  it('defaults to info when unset', () => {
    expect(resolveLogLevels(undefined)).toEqual(['fatal', 'error', 'warn', 'log']);
  });

  it('rejects unknown levels', () => {
    expect(() => resolveLogLevels('loud')).toThrow();
  });
});
