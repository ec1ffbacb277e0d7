/**
 * Bounded retry for remote calls
 *
 * Only transport failures (NETWORK_ERROR) are retried. Each attempt goes
 * through the rate limiter again, so retries count against the budget.
 */

import { type GatewayResult, isTransientError, type Logger } from "@folio/protocol";
import type { RateLimiter } from "@folio/rate-limiter";

// ============================================================================
// Types
// ============================================================================

export type RetryPolicy = {
  /** Total attempts including the first (>= 1) */
  maxAttempts: number;
  /** Delay before the second attempt; doubles after each failure */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
};

export type RetryContext = {
  limiter: RateLimiter;
  policy: RetryPolicy;
  sleep: (ms: number) => Promise<void>;
  logger: Logger;
};

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

// ============================================================================
// Functions
// ============================================================================

/**
 * Delay after the given failed attempt (1-based).
 *
 * Example: base 200, max 2000 -> 200, 400, 800, 1600, 2000, 2000, ...
 */
export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));

/**
 * Acquire a rate-limit slot and run `call`, repeating on transient errors
 * until it succeeds, fails permanently, or attempts run out. The last
 * result is returned as-is.
 */
export const callWithRetry = async <T>(
  ctx: RetryContext,
  label: string,
  call: () => Promise<GatewayResult<T>>
): Promise<GatewayResult<T>> => {
  const { limiter, policy, sleep, logger } = ctx;
  for (let attempt = 1; ; attempt++) {
    await limiter.acquire();
    const result = await call();
    if (result.ok || !isTransientError(result.error) || attempt >= policy.maxAttempts) {
      return result;
    }

    const delay = backoffDelay(policy, attempt);
    logger.warn(
      `[post-store] ${label} failed (${result.error.message}), attempt ${attempt}/${policy.maxAttempts}, retrying in ${delay}ms`
    );
    await sleep(delay);
  }
};
