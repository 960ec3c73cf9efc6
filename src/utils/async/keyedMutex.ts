type Release = () => void;

/**
 * Async mutex partitioned by key: callers holding different keys never wait on each other,
 * callers sharing a key run one at a time in arrival order.
 */
export class KeyedMutex<K = string> {
  private queues = new Map<K, Array<(release: Release) => void>>();

  /**
   * Acquires the lock for `key`. If the lock is already held, waits until it's released.
   * Returns a function that must be called to release the lock.
   */
  async acquire(key: K): Promise<Release> {
    return new Promise<Release>(resolve => {
      const waiters = this.queues.get(key);
      if (!waiters) {
        this.queues.set(key, []);
        resolve(this.createRelease(key));
      } else {
        waiters.push(resolve);
      }
    });
  }

  /** Runs `fn` while holding the lock for `key`, releasing it when `fn` settles. */
  async runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  public isLocked(key: K) {
    return this.queues.has(key);
  }

  private createRelease(key: K): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queues.get(key)?.shift();
      if (next) next(this.createRelease(key));
      else this.queues.delete(key);
    };
  }
}
