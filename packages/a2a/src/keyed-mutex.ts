/**
 * Per-key async mutex.
 *
 * Critical sections for the same key run one at a time in arrival order;
 * different keys never wait on each other. A key's lock is dropped once its
 * last waiter releases, so idle sessions hold no state.
 */

class AsyncMutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  /** Resolves with a release function once the lock is held */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = (): void => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}

interface LockEntry {
  readonly mutex: AsyncMutex;
  holders: number;
}

export class KeyedMutex {
  private readonly locks: Map<string, LockEntry> = new Map();

  /**
   * Run `fn` with the lock for `key` held.
   */
  async withLock<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new AsyncMutex(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders += 1;

    const release = await entry.mutex.acquire();
    try {
      return await fn();
    } finally {
      release();
      entry.holders -= 1;
      if (entry.holders === 0) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with a held or awaited lock */
  get size(): number {
    return this.locks.size;
  }
}
