/**
 * Per-key async critical sections.
 *
 * Callers sharing a key run one at a time in arrival order; different keys
 * never wait on each other. A key's chain is dropped once it drains.
 */

export interface KeyedLock {
  run<T>(key: string, fn: () => Promise<T>): Promise<T>;
  /** Keys with a holder or waiters right now. */
  readonly activeKeys: number;
}

export function createKeyedLock(): KeyedLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(key: string, fn: () => Promise<T>): Promise<T> {
      const prev = tails.get(key) ?? Promise.resolve();
      const result = prev.then(fn);
      // The tail never rejects, so the next holder starts whatever this one did.
      const tail = result.then(() => undefined, () => undefined);
      tails.set(key, tail);
      void tail.then(() => {
        if (tails.get(key) === tail) tails.delete(key);
      });
      return result;
    },

    get activeKeys(): number {
      return tails.size;
    },
  };
}
