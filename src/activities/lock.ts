// --- Keyed lock: per-key sequential execution ---
// Tasks sharing a key run one after another; different keys never wait on each other.

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task queued under `key` has settled.
   * A rejected task does not block the ones queued after it.
   */
  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(() => undefined, () => undefined);
    this.tails.set(key, tail);

    // Forget the key once nothing else has queued behind this task
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }

  /** Number of keys with queued or running tasks. */
  get activeKeys(): number {
    return this.tails.size;
  }
}
