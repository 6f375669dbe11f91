/**
 * Keyed Serial Queue - per-key ordered task execution
 *
 * Tasks sharing a key run one after another in submission order.
 * Tasks with different keys never wait on each other.
 */

export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` after every task previously submitted under `key`.
   * A failing task does not break the chain for later tasks.
   */
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

  /**
   * Resolve once every queued task (for every key) has settled
   */
  async drain(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
