// Per-tenant mutex that serializes player and registry mutations.
// A Map<key, Promise<void>> acts as a chain: each run() appends a promise to
// the end of the key's chain, so tasks for one key run FIFO while different
// keys never wait on each other.

export type MutexTask<T> = () => Promise<T> | T;

export class TenantMutex {
  private chains = new Map<string, Promise<void>>();

  async run<T>(key: string, task: MutexTask<T>): Promise<T> {
    const prev = this.chains.get(key) ?? Promise.resolve();

    let release = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chain = prev.then(() => current);
    this.chains.set(key, chain);

    try {
      await prev;
      return await task();
    } finally {
      release();

      // Drop the chain if nothing queued behind us
      if (this.chains.get(key) === chain) {
        this.chains.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.chains.has(key);
  }

  get size(): number {
    return this.chains.size;
  }
}
