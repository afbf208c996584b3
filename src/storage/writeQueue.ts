/**
 * Runs tasks one after another per key. Tasks on different keys run freely.
 *
 * A failed task does not poison the chain: the next task for the same key
 * still runs, and the failure is delivered only to the caller that queued it.
 */
export class KeyedWriteQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }
}
