/**
 * Unit tests for createRateLimiter
 *
 * A fake clock drives time: `sleep(ms)` advances it instantly, so every
 * expected timestamp is exact.
 */

import { describe, expect, it, vi } from "vitest";
import { createMutex } from "./mutex.ts";
import { createRateLimiter } from "./rate-limiter.ts";

// ============================================================================
// Helpers
// ============================================================================

function createFakeClock() {
  let t = 0;
  return {
    now: () => t,
    sleep: vi.fn(async (ms: number) => {
      t += ms;
    }),
    advance: (ms: number) => {
      t += ms;
    },
  };
}

const silentLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

// ============================================================================
// Tests: createRateLimiter
// ============================================================================

describe("createRateLimiter", () => {
  it("should admit up to maxRequests without waiting", async () => {
    const clock = createFakeClock();
    const limiter = createRateLimiter({
      maxRequests: 3,
      windowMs: 1000,
      now: clock.now,
      sleep: clock.sleep,
      logger: silentLogger(),
    });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleep).not.toHaveBeenCalled();
    expect(limiter.size()).toBe(3);
  });

  it("should wait until the oldest call leaves the window", async () => {
    const clock = createFakeClock();
    const logger = silentLogger();
    const limiter = createRateLimiter({
      maxRequests: 3,
      windowMs: 1000,
      now: clock.now,
      sleep: clock.sleep,
      logger,
    });

    await limiter.acquire(); // t=0
    clock.advance(100);
    await limiter.acquire(); // t=100
    clock.advance(100);
    await limiter.acquire(); // t=200

    await limiter.acquire();

    expect(clock.sleep).toHaveBeenCalledTimes(1);
    expect(clock.sleep).toHaveBeenCalledWith(800);
    expect(clock.now()).toBe(1000);
    expect(limiter.size()).toBe(3);
    expect(logger.warn).toHaveBeenCalledWith("[rate-limiter] limit of 3 reached, waiting 800ms");
  });

  it("should forget calls once the window has passed", async () => {
    const clock = createFakeClock();
    const limiter = createRateLimiter({
      maxRequests: 2,
      windowMs: 500,
      now: clock.now,
      sleep: clock.sleep,
      logger: silentLogger(),
    });

    await limiter.acquire();
    await limiter.acquire();
    clock.advance(500);

    expect(limiter.size()).toBe(0);
    await limiter.acquire();
    expect(clock.sleep).not.toHaveBeenCalled();
  });

  it("should never record more than maxRequests in any window under concurrency", async () => {
    const clock = createFakeClock();
    const recorded: number[] = [];
    const limiter = createRateLimiter({
      maxRequests: 3,
      windowMs: 1000,
      now: clock.now,
      sleep: clock.sleep,
      logger: silentLogger(),
      onAcquire: () => recorded.push(clock.now()),
    });

    await Promise.all(Array.from({ length: 10 }, () => limiter.acquire()));

    expect(recorded).toEqual([0, 0, 0, 1000, 1000, 1000, 2000, 2000, 2000, 3000]);
    for (let i = 0; i + 3 < recorded.length; i++) {
      const start = recorded[i] ?? 0;
      const fourth = recorded[i + 3] ?? 0;
      expect(fourth - start).toBeGreaterThanOrEqual(1000);
    }
  });

  it("should keep acquisitions a full window apart on real timers", async () => {
    let last = 0;
    const recorded: number[] = [];
    const limiter = createRateLimiter({
      maxRequests: 1,
      windowMs: 20,
      now: () => {
        last = performance.now();
        return last;
      },
      logger: silentLogger(),
      onAcquire: () => recorded.push(last),
    });

    for (let i = 0; i < 10; i++) {
      await limiter.acquire();
    }

    expect(recorded).toHaveLength(10);
    for (let i = 1; i < recorded.length; i++) {
      expect((recorded[i] ?? 0) - (recorded[i - 1] ?? 0)).toBeGreaterThanOrEqual(20);
    }
  });

  it("should reject invalid configuration", () => {
    expect(() => createRateLimiter({ maxRequests: 0, windowMs: 1000 })).toThrow(
      "maxRequests must be a positive integer (got 0)"
    );
    expect(() => createRateLimiter({ maxRequests: 1, windowMs: 0 })).toThrow(
      "windowMs must be positive (got 0)"
    );
  });
});

// ============================================================================
// Tests: createMutex
// ============================================================================

describe("createMutex", () => {
  it("should run critical sections one at a time in arrival order", async () => {
    const mutex = createMutex();
    const events: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await Promise.resolve();
        await Promise.resolve();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([section("a"), section("b"), section("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("should keep going after a section rejects", async () => {
    const mutex = createMutex();

    const failing = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(() => 42);

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
    expect(mutex.isLocked()).toBe(false);
  });
});
