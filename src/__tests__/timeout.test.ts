import { describe, it, expect } from '@jest/globals';
import { withTimeout } from '../pipeline/timeout.js';
import {
  ConfigurationError,
  describeError,
  FatalSetupError,
  TimeoutError,
} from '../shared/errors.js';

describe('withTimeout', () => {
  it('resolves with the task result within budget', async () => {
    await expect(withTimeout('fast task', 1000, async () => 42)).resolves.toBe(42);
  });

  it('aborts the task and rejects with TimeoutError when the budget is spent', async () => {
    const signals: AbortSignal[] = [];
    const pending = withTimeout('slow task', 10, (signal) => {
      signals.push(signal);
      return new Promise<number>(() => undefined);
    });

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('slow task timed out after 10ms');
    expect(signals[0]?.aborted).toBe(true);
  });

  it('passes through task failures, including synchronous throws', async () => {
    await expect(withTimeout('task', 1000, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(
      withTimeout('task', 1000, () => {
        throw new Error('sync boom');
      }),
    ).rejects.toThrow('sync boom');
  });
});

describe('describeError', () => {
  it('uses the error code for pipeline errors', () => {
    expect(describeError(new FatalSetupError('/src/repo', 'no such directory'))).toEqual({
      type: 'checkout',
      message: 'Checkout of /src/repo failed: no such directory',
    });
    expect(describeError(new ConfigurationError('bad', 'stages.0'))).toEqual({
      type: 'configuration',
      message: 'stages.0: bad',
    });
  });

  it('falls back to the error name or a string', () => {
    expect(describeError(new TypeError('x is undefined'))).toEqual({ type: 'TypeError', message: 'x is undefined' });
    expect(describeError('plain failure')).toEqual({ type: 'unknown', message: 'plain failure' });
  });
});
