import { describe, it, expect, vi } from 'vitest';
import { waitForEmpty } from './purge-poller';
import { QueueErrorCode } from '../types';

function lengths(...values: number[]): () => Promise<number> {
  const remaining = [...values];
  return vi.fn(async () => remaining.shift() ?? 0);
}

describe('waitForEmpty', () => {
  it('should return after the first read when already empty', async () => {
    const readLength = lengths(0);

    await waitForEmpty(readLength);

    expect(readLength).toHaveBeenCalledTimes(1);
  });

  it('should keep reading until the length reaches zero', async () => {
    const readLength = lengths(5, 3, 0);

    await waitForEmpty(readLength, { intervalMs: 1 });

    expect(readLength).toHaveBeenCalledTimes(3);
  });

  it('should sleep the interval between reads', async () => {
    vi.useFakeTimers();
    try {
      const readLength = lengths(2, 0);
      const done = waitForEmpty(readLength, { intervalMs: 50 });

      await vi.advanceTimersByTimeAsync(49);
      expect(readLength).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await done;
      expect(readLength).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should reject with PURGE_TIMEOUT once the deadline passes', async () => {
    const readLength = vi.fn(async () => 4);

    await expect(waitForEmpty(readLength, { intervalMs: 1, timeoutMs: 5 })).rejects.toMatchObject({
      code: QueueErrorCode.PURGE_TIMEOUT,
      context: { lastLength: 4 },
    });
  });

  it('should reject with PURGE_ABORTED when the signal is aborted', async () => {
    const controller = new AbortController();
    const readLength = vi.fn(async () => {
      controller.abort();
      return 1;
    });

    await expect(waitForEmpty(readLength, { intervalMs: 1, signal: controller.signal })).rejects.toMatchObject({
      code: QueueErrorCode.PURGE_ABORTED,
    });
    expect(readLength).toHaveBeenCalledTimes(1);
  });

  it('should stop sleeping as soon as the signal is aborted', async () => {
    vi.useFakeTimers();
    try {
      const controller = new AbortController();
      const readLength = vi.fn(async () => 3);
      const outcome = expect(
        waitForEmpty(readLength, { intervalMs: 1000, signal: controller.signal })
      ).rejects.toMatchObject({ code: QueueErrorCode.PURGE_ABORTED });

      await vi.advanceTimersByTimeAsync(10);
      controller.abort();
      await outcome;

      expect(readLength).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should not sleep past the deadline when the interval is longer', async () => {
    vi.useFakeTimers();
    try {
      const readLength = vi.fn(async () => 3);
      const outcome = expect(
        waitForEmpty(readLength, { intervalMs: 1000, timeoutMs: 50 })
      ).rejects.toMatchObject({ code: QueueErrorCode.PURGE_TIMEOUT, context: { lastLength: 3, reads: 2 } });

      await vi.advanceTimersByTimeAsync(50);
      await outcome;

      expect(readLength).toHaveBeenCalledTimes(2);
      expect(vi.getTimerCount()).toBe(0);
    } finally {
      vi.useRealTimers();
    }
  });

  it('should propagate errors from reading the length', async () => {
    const error = new Error('Throttled');
    const readLength = vi.fn(async () => {
      throw error;
    });

    await expect(waitForEmpty(readLength)).rejects.toBe(error);
  });

  it('should log progress at debug level', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await waitForEmpty(lengths(1, 0), { intervalMs: 1, logger });

    expect(logger.debug).toHaveBeenCalledWith('Waiting for purge to complete, 1 message(s) remaining');
    expect(logger.debug).toHaveBeenCalledWith('Queue reported empty after 2 length read(s)');
  });
});
