/**
 * Per-key promise chain.
 *
 * Work submitted under the same key runs strictly one after another, in
 * submission order. Different keys never wait on each other. Serialization is
 * per process: instances behind a load balancer do not share it.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await work();
    } finally {
      release();
    }
  }

  /**
   * Wait for the key and hold it until the returned function is called.
   */
  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let resolveCurrent: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      resolveCurrent = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    return () => {
      resolveCurrent();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Number of keys with work queued or running.
   */
  get size(): number {
    return this.tails.size;
  }
}
