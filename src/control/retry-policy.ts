import { MAX_TIMER_DELAY_MS } from "./timeout-guard.js";

export type RetryDecision = {
  retry: boolean;
  delayMs: number;
  /** Value retryCount takes if the retry goes ahead. */
  nextRetryCount: number;
};

export interface RetryPolicyOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterRatio?: number;
}

/**
 * retryCount counts retries already scheduled. The delay uses the incremented
 * count: base * 2^(retryCount + 1), capped at maxDelayMs before jitter.
 */
export function computeRetryDecision(
  input: { retryCount: number; maxRetries: number },
  options: RetryPolicyOptions = {},
  random: () => number = Math.random
): RetryDecision {
  const base = Math.max(1, options.baseDelayMs ?? 1_000);
  const maxDelay = Math.max(base, options.maxDelayMs ?? 60_000);
  const jitterRatio = Math.max(0, Math.min(0.5, options.jitterRatio ?? 0));

  if (input.retryCount >= input.maxRetries) {
    return { retry: false, delayMs: 0, nextRetryCount: input.retryCount };
  }

  const nextRetryCount = input.retryCount + 1;
  const exp = Math.min(maxDelay, base * 2 ** nextRetryCount);
  const jitter = jitterRatio > 0 ? Math.round(exp * jitterRatio * random()) : 0;

  return { retry: true, delayMs: Math.min(MAX_TIMER_DELAY_MS, exp + jitter), nextRetryCount };
}
