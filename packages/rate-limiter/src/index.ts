/**
 * @folio/rate-limiter
 *
 * Sliding-window limiter for the remote file API.
 */

export { createMutex, type Mutex } from "./mutex.ts";
export {
  createRateLimiter,
  DEFAULT_MAX_REQUESTS,
  DEFAULT_WINDOW_MS,
  type RateLimiter,
  type RateLimiterConfig,
} from "./rate-limiter.ts";
