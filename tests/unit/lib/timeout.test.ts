/**
 * Timeout guard tests
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { TimeoutError, withTimeout } from '@/lib/timeout.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the task result', async () => {
    const result = await withTimeout(async () => 'done', 1000);

    expect(result).toBe('done');
  });

  it('should pass through task errors', async () => {
    await expect(
      withTimeout(async () => {
        throw new Error('refused');
      }, 1000)
    ).rejects.toThrow('refused');
  });

  it('should reject with TimeoutError and abort the signal', async () => {
    vi.useFakeTimers();
    let signal: AbortSignal | undefined;

    const pending = withTimeout(
      (s) => {
        signal = s;
        return new Promise<string>(() => {});
      },
      500,
      'blob store'
    );
    const assertion = expect(pending).rejects.toEqual(
      new TimeoutError('blob store timed out after 500ms', 500)
    );

    await vi.advanceTimersByTimeAsync(500);
    await assertion;

    expect(signal?.aborted).toBe(true);
    expect(signal?.reason).toBeInstanceOf(TimeoutError);
  });
});
