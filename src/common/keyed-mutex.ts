/**
 * Serializes async work per key.
 *
 * Calls for the same key run one after another in call order; calls for
 * different keys run concurrently. A failing task does not block the
 * tasks queued behind it.
 */
export class KeyedMutex<K> {
  private readonly tails = new Map<K, Promise<unknown>>();

  runExclusive<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const next = previous.then(task, task);
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return next;
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }
}
