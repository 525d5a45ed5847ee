import { Logger, QueueError, QueueErrorCode } from '../types';

export const DEFAULT_PURGE_POLL_INTERVAL_MS = 50;

export interface WaitForEmptyOptions {
  /** Delay between length reads. */
  intervalMs?: number;
  /** Give up after this long. Waits indefinitely when omitted. */
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Reads the queue length until it reports zero. SQS purges take up to 60
 * seconds to be reflected in the length attribute, usually well under one.
 */
export async function waitForEmpty(
  readLength: () => Promise<number>,
  options: WaitForEmptyOptions = {}
): Promise<void> {
  const intervalMs = options.intervalMs ?? DEFAULT_PURGE_POLL_INTERVAL_MS;
  const deadline = options.timeoutMs === undefined ? undefined : Date.now() + options.timeoutMs;
  let reads = 0;

  for (;;) {
    throwIfAborted(options.signal);

    const length = await readLength();
    reads++;
    if (length === 0) {
      options.logger?.debug(`Queue reported empty after ${reads} length read(s)`);
      return;
    }

    if (deadline !== undefined && Date.now() >= deadline) {
      throw new QueueError(
        `Queue still reported ${length} message(s) after ${options.timeoutMs}ms`,
        QueueErrorCode.PURGE_TIMEOUT,
        true,
        { lastLength: length, reads }
      );
    }

    options.logger?.debug(`Waiting for purge to complete, ${length} message(s) remaining`);
    const waitMs = deadline === undefined ? intervalMs : Math.min(intervalMs, Math.max(deadline - Date.now(), 0));
    await sleep(waitMs, options.signal);
  }
}

function abortedError(): QueueError {
  return new QueueError('Waiting for purge was aborted', QueueErrorCode.PURGE_ABORTED, false);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortedError();
  }
}

/**
 * Resolves after `ms`, or rejects as soon as the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
