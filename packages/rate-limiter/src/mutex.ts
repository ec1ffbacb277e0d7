/**
 * Promise-chain mutex.
 *
 * Callers queue in arrival order; each critical section starts only after
 * the previous one settled, whether it resolved or rejected.
 */

export type Mutex = {
  runExclusive: <T>(fn: () => Promise<T> | T) => Promise<T>;
  /** True while a critical section is running or queued */
  isLocked: () => boolean;
};

export const createMutex = (): Mutex => {
  let tail: Promise<void> = Promise.resolve();
  let pending = 0;

  return {
    runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
      pending++;
      const run = tail.then(fn);
      // The next caller waits for this section to settle, never for its value
      tail = run.then(
        () => undefined,
        () => undefined
      );
      return run.finally(() => {
        pending--;
      });
    },

    isLocked: () => pending > 0,
  };
};
