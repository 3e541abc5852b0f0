import { sleep } from "./sleep.js";

/** How many times to try, and how long to back off between tries. */
export interface RetryPolicy {
  readonly attempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetryHooks {
  readonly signal?: AbortSignal;
  /** Called after a failed attempt that will be retried. */
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 10_000,
};

/**
 * Delay before retrying after `attempt` (zero-based): exponential in the
 * attempt, capped at `maxDelayMs`, then scaled by a random factor in [0.5, 1).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random = Math.random): number {
  const capped = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  return capped * (0.5 + random() * 0.5);
}

/**
 * Runs `fn` until it resolves or the policy runs out of attempts, rethrowing
 * the last failure. An abort ends the wait at once with the signal's reason.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  const { signal, onRetry } = hooks;

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt + 1 >= policy.attempts) throw err;
      const delay = backoffDelay(policy, attempt);
      onRetry?.(err, attempt, delay);
      await sleep(delay, signal);
    }
  }
}
