// In-process keyed mutex
//
// Serializes tokenization of one identity. Keys are acquired in sorted order
// so two calls sharing several keys cannot deadlock. The store's unique
// constraints cover other processes.

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  private async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Run `fn` while holding every key.
   */
  async runExclusive<T>(keys: string[], fn: () => Promise<T>): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const releases: Array<() => void> = [];

    try {
      for (const key of ordered) {
        releases.push(await this.acquire(key));
      }
      return await fn();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /** Number of keys currently held or awaited. */
  get size(): number {
    return this.tails.size;
  }
}
