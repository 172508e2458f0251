// src/utils/lock.ts

/**
 * Serializes async work per key. Callers sharing a key run one at a time in
 * arrival order; different keys never wait on each other.
 * In-process only: nothing is coordinated across processes.
 */
export class KeyedLock<K> {
  private tails = new Map<K, Promise<void>>();

  async run<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with work queued or running. */
  get pending(): number {
    return this.tails.size;
  }
}
