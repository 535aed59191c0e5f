/**
 * Serializes async tasks per key.
 *
 * Tasks sharing a key run one after another in submission order; tasks with
 * different keys run independently. A key's queue is dropped once its last
 * task settles.
 *
 * @example
 * ```ts
 * const lock = new WorkerLock();
 * await lock.runExclusive("worker-1", async () => {
 *   const snapshot = await store.loadSnapshot("worker-1");
 *   // validate and persist while no other task for worker-1 runs
 * });
 * ```
 */
export class WorkerLock {
  #tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.#tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }

  /** Whether a task for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.#tails.has(key);
  }
}
