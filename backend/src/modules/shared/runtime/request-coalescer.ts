/**
 * REQUEST COALESCER
 * =================
 *
 * One in-flight promise per key. The orchestrator keys history fetches by
 * `SYMBOL:start:end` of the missing sub-range, quotes by symbol and
 * analyses by fingerprint, so a burst of cold requests for the same data
 * turns into a single provider call (and a single write-back).
 *
 * The entry is dropped when the work settles, success or failure; a
 * caller that stops waiting leaves it in place for the others.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Run fn for key unless a run for key is already in flight
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const p = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, p);
    return p;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }
}
