/**
 * Serializes async work per key. Work queued under different keys runs
 * concurrently; work under the same key runs in submission order.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    const queueEntry = previous.then(() => current);
    this.tails.set(key, queueEntry);

    await previous;

    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(key) === queueEntry) {
        this.tails.delete(key);
      }
    }
  }
}
