import { setTimeout as delay } from "node:timers/promises";
import { TimeoutError } from "../errors/updaterErrors.js";
import type { Sleep } from "../types/interfaces.js";

export const realSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
  sleep: Sleep;
}

/**
 * Runs `op` until it succeeds or `policy.attempts` is exhausted, sleeping a fixed
 * `delayMs` between attempts. The last failure is rethrown unchanged.
 */
export async function retryWithFixedDelay<T>(
  op: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (info: { attempt: number; attempts: number; error: unknown }) => void
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await op(attempt);
    } catch (error) {
      if (attempt >= attempts) {
        throw error;
      }
      onRetry?.({ attempt, attempts, error });
      await policy.sleep(policy.delayMs);
    }
  }
}

/**
 * Rejects with TimeoutError when `operation` has not settled after `timeoutMs`.
 * The operation itself keeps running; there is no way to cancel an in-flight RPC.
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, sleep: Sleep, label: string): Promise<T> {
  const timer = new AbortController();
  const expiry = sleep(timeoutMs, timer.signal).then((): never => {
    throw new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs);
  });
  // Whichever side loses the race settles later with nobody listening.
  void expiry.catch(() => undefined);
  void operation.catch(() => undefined);
  try {
    return await Promise.race([operation, expiry]);
  } finally {
    timer.abort();
  }
}
