/**
 * Runs async tasks one at a time per key; tasks under different keys still
 * interleave. A failing task does not block the ones queued behind it.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(task);

    const tail: Promise<void> = result.then(
      () => this.settle(key, tail),
      () => this.settle(key, tail)
    );
    this.tails.set(key, tail);
    return result;
  }

  /** Keys with work queued or running. */
  get size(): number {
    return this.tails.size;
  }

  private settle(key: string, tail: Promise<void>) {
    if (this.tails.get(key) === tail) this.tails.delete(key);
  }
}
