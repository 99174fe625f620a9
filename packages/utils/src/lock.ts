/**
 * Keyed Lock
 *
 * Serializes async work that shares a key (a destination path, for example).
 * Work on different keys runs independently.
 */

export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier holder of `key` has finished
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
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

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
