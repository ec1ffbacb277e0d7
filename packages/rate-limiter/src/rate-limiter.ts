/**
 * Sliding-window rate limiter
 *
 * Keeps the timestamps of recent acquisitions. On each `acquire()`:
 *
 *   1. drop timestamps older than `now - windowMs`
 *   2. while `maxRequests` remain, sleep until the oldest should have
 *      left the window and prune again
 *   3. record the current time
 *
 * The sequence is guarded by a mutex: one caller mutates at a time, any
 * number may be queued. Waiting suspends only the calling task.
 *
 * @packageDocumentation
 */

import type { Logger } from "@folio/protocol";
import { createMutex } from "./mutex.ts";

// ============================================================================
// Types
// ============================================================================

export type RateLimiterConfig = {
  /** Acquisitions allowed in any window */
  maxRequests: number;
  /** Window length in milliseconds */
  windowMs: number;
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
  /** Suspend the caller for `ms` milliseconds (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  /** Called after each recorded acquisition */
  onAcquire?: () => void;
};

export type RateLimiter = {
  /** Resolve once a slot is available and has been recorded */
  acquire: () => Promise<void>;
  /** Number of recorded acquisitions still inside the window */
  size: () => number;
};

// ============================================================================
// Constants
// ============================================================================

/** Dropbox allows 500 requests per minute; keep some headroom */
export const DEFAULT_MAX_REQUESTS = 450;
export const DEFAULT_WINDOW_MS = 60_000;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

// ============================================================================
// Factory
// ============================================================================

export const createRateLimiter = (config: RateLimiterConfig): RateLimiter => {
  const {
    maxRequests,
    windowMs,
    now = () => performance.now(),
    sleep = defaultSleep,
    logger = console,
    onAcquire,
  } = config;

  if (!Number.isInteger(maxRequests) || maxRequests < 1) {
    throw new Error(`maxRequests must be a positive integer (got ${maxRequests})`);
  }
  if (!(windowMs > 0)) {
    throw new Error(`windowMs must be positive (got ${windowMs})`);
  }

  const mutex = createMutex();
  const timestamps: number[] = [];

  const prune = (at: number): void => {
    while (timestamps.length > 0) {
      const oldest = timestamps[0];
      if (oldest === undefined || at - oldest < windowMs) break;
      timestamps.shift();
    }
  };

  return {
    acquire: () =>
      mutex.runExclusive(async () => {
        prune(now());

        // A timer may fire early, so re-check the clock after every sleep
        while (timestamps.length >= maxRequests) {
          const oldest = timestamps[0] ?? now();
          const waitMs = Math.ceil(windowMs - (now() - oldest));
          logger.warn(`[rate-limiter] limit of ${maxRequests} reached, waiting ${waitMs}ms`);
          await sleep(waitMs);
          prune(now());
        }

        timestamps.push(now());
        onAcquire?.();
      }),

    size: () => {
      prune(now());
      return timestamps.length;
    },
  };
};
