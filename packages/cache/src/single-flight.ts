/**
 * Coalesces concurrent calls for the same key into one underlying operation.
 * The key is forgotten as soon as the operation settles, so a failure is
 * shared by the callers that were waiting but never remembered.
 */
export class SingleFlight<K, V> {
  private pending = new Map<K, Promise<V>>();

  do(key: K, fn: () => Promise<V>): Promise<V> {
    const existing = this.pending.get(key);
    if (existing) return existing;

    const promise = (async () => {
      try {
        return await fn();
      } finally {
        this.pending.delete(key);
      }
    })();

    this.pending.set(key, promise);
    return promise;
  }

  inFlight(key: K): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }
}
