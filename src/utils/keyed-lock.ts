const settle = (): void => undefined;

/**
 * Serializes async work per key. Each call is chained onto the tail of its
 * key's queue, so same-key work runs FIFO while other keys run freely.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  public async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const current = previous.then(fn);
    // The queue moves on whether this call succeeds or fails
    const tail = current.then(settle, settle);
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  public isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
