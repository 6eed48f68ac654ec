import { TimeoutError } from '@nodeconf/core';

/**
 * Settle with `promise`, or reject with TimeoutError after `timeoutMs`.
 * The underlying work is not cancelled; callers that need it stopped
 * pass their own AbortSignal to it.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
