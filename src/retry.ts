/**
 * Retry loop with a fixed delay, optional jitter, and an explicit unbounded mode.
 */

import { CancelledError } from "./errors.js";

export interface RetryPolicy {
  /** Total attempts including the first; "unbounded" never gives up */
  maxAttempts: number | "unbounded";
  /** Fixed wait between attempts in ms */
  delayMs: number;
  /** Up to this many ms are added to each wait at random */
  jitterMs: number;
}

export interface RetryInfo {
  /** The attempt that just failed (1-based) */
  attempt: number;
  error: unknown;
  delayMs: number;
}

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  /** Called before every wait; the place to log a retry heartbeat */
  onRetry?: (info: RetryInfo) => void;
  /** Errors for which this returns false are rethrown at once */
  shouldRetry?: (error: unknown) => boolean;
  random?: () => number;
}

/**
 * Wait for `ms`. Resolves early (without throwing) when the signal aborts,
 * leaving it to the caller to check `signal.aborted`.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function retryDelay(policy: RetryPolicy, random: () => number = Math.random): number {
  if (policy.jitterMs <= 0) return policy.delayMs;
  return policy.delayMs + Math.floor(random() * policy.jitterMs);
}

function hasAttemptsLeft(policy: RetryPolicy, attempt: number): boolean {
  return policy.maxAttempts === "unbounded" || attempt < policy.maxAttempts;
}

/**
 * Run `task` until it resolves or the policy is exhausted.
 * Throws the last error on exhaustion, or CancelledError when the signal
 * aborts before another attempt could start.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { policy, signal } = options;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) throw new CancelledError();

    try {
      return await task(attempt);
    } catch (err) {
      if (options.shouldRetry && !options.shouldRetry(err)) throw err;
      if (!hasAttemptsLeft(policy, attempt)) throw err;

      const delayMs = retryDelay(policy, options.random);
      options.onRetry?.({ attempt, error: err, delayMs });
      await sleep(delayMs, signal);
    }
  }
}
