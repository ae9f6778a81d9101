/**
 * Serializes async tasks per key. Tasks for the same key run one after
 * another in call order; tasks for different keys do not wait on each other.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex()
 * await locks.runExclusive(sessionId, async () => {
 *   const cart = await repository.getCart(sessionId)
 *   await repository.saveCart(mutate(cart))
 * })
 * ```
 */
export class KeyedMutex {
  /** Tail of the task chain per key; never rejects */
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    const tail = run.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      // only the last queued task may drop the key
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with a running or queued task */
  get size(): number {
    return this.tails.size;
  }
}
