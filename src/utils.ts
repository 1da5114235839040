/**
 * Common utility functions for the sync engine and its consumers.
 */

/**
 * Generate a UUID v4 (random UUID).
 */
export function generateId(): string {
  return crypto.randomUUID();
}

/**
 * Get the current timestamp as an ISO string.
 */
export function now(): string {
  return new Date().toISOString();
}

/**
 * Resolve after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let the host process exit while `timer` is still pending. Browser timer ids
 * have nothing to unref.
 */
export function unrefTimer(timer: unknown): void {
  if (
    typeof timer === 'object' &&
    timer !== null &&
    'unref' in timer &&
    typeof timer.unref === 'function'
  ) {
    timer.unref();
  }
}

/**
 * A set of independent async locks, one per key.
 *
 * Callers for the same key run one after another in arrival order; callers
 * for different keys never wait on each other. A rejected task does not
 * poison the chain for the next caller.
 */
export interface KeyedMutex {
  run<T>(key: string, task: () => Promise<T>): Promise<T>;
  /** Number of keys with a task running or waiting. */
  readonly size: number;
}

export function createKeyedMutex(): KeyedMutex {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, task: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();
      const result = previous.then(task);
      const tail = result.then(
        () => undefined,
        () => undefined
      );
      tails.set(key, tail);
      // Drop the entry once nothing else has queued behind this task
      void tail.then(() => {
        if (tails.get(key) === tail) tails.delete(key);
      });
      return result;
    },
    get size() {
      return tails.size;
    }
  };
}
