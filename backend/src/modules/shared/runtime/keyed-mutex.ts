/**
 * KEYED MUTEX
 * ===========
 *
 * Per-key mutual exclusion for cache check and write-back. Different keys
 * never wait on each other. Holders must not await network I/O inside
 * the critical section.
 */

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder cleans up so the map does not grow with cold keys
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  size(): number {
    return this.tails.size;
  }
}
