import { describe, it, expect } from 'vitest';
import { TimeoutError } from '@nodeconf/core';
import { withTimeout } from '../../src/engine/timeout.js';

describe('withTimeout', () => {
  it('should pass through a result that arrives in time', async () => {
    expect(await withTimeout(Promise.resolve(42), 1000, 'answer')).toBe(42);
  });

  it('should pass through a rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('nope')), 1000, 'answer')).rejects.toThrow('nope');
  });

  it('should reject with TimeoutError when the work takes too long', async () => {
    const err = await withTimeout(new Promise(() => undefined), 10, 'slow step').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    if (!(err instanceof TimeoutError)) return;
    expect(err.message).toBe('slow step timed out after 10ms');
    expect(err.timeoutMs).toBe(10);
  });
});
