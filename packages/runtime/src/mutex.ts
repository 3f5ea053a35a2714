/**
 * Simple Mutex implementation using closures for state management
 * Ensures proper lock release even on errors
 */
export type Mutex = {
  acquire(): Promise<() => void>;
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
  /** Whether a holder currently owns the lock */
  readonly locked: boolean;
  /** Number of callers queued behind the holder */
  readonly waiting: number;
};

export function createMutex(): Mutex {
  const queue: Array<() => void> = [];
  let locked = false;

  const release = (): void => {
    const next = queue.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      locked = false;
    }
  };

  const acquire = (): Promise<() => void> =>
    new Promise<() => void>((resolve) => {
      let released = false;
      const grant = () => {
        locked = true;
        resolve(() => {
          if (released) return;
          released = true;
          release();
        });
      };

      if (locked) {
        queue.push(grant);
      } else {
        grant();
      }
    });

  const runExclusive = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  };

  return {
    acquire,
    runExclusive,
    get locked() {
      return locked;
    },
    get waiting() {
      return queue.length;
    }
  };
}
