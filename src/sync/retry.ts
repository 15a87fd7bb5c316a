/**
 * @fileoverview Retry with exponential backoff and per-attempt timeouts.
 * Time is injected through a Sleeper so the policy can be tested without
 * real delays.
 */

import { FetchError, isTransient } from "./errors.js";
import type { RetryPolicy } from "./types.js";

export type Sleeper = (ms: number) => Promise<void>;

export const realSleep: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `attempt` (0-based): `backoffBaseMs * 2^attempt`.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.backoffBaseMs * 2 ** attempt;
}

/**
 * Runs one attempt with a deadline. The attempt's signal is aborted when the
 * deadline passes and the returned promise rejects with a transient FetchError,
 * whether or not the attempt honours the signal.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  attempt: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new FetchError(`Attempt timed out after ${timeoutMs}ms`, {
        transient: true,
      });
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([attempt(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Outcome of running an operation under a retry policy.
 */
export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryOptions {
  policy: RetryPolicy;
  sleep: Sleeper;
  /** Checked before each retry; when it returns true no further attempt starts. */
  stopped?: () => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Calls `operation` until it succeeds, fails non-transiently, or the policy
 * runs out of retries. Never throws; the last error is returned instead.
 */
export async function retryTransient<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const { policy, sleep } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt + 1 };
    } catch (error) {
      const exhausted = attempt >= policy.maxRetries;
      if (!isTransient(error) || exhausted || options.stopped?.()) {
        return { ok: false, error, attempts: attempt + 1 };
      }

      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);

      if (options.stopped?.()) {
        return { ok: false, error, attempts: attempt + 1 };
      }
    }
  }
}
