/**
 * Exclusive sections keyed by an identifier. Tasks sharing a key run one at a
 * time in arrival order; tasks with different keys never wait on each other.
 * The supervisor keys sections by session id so probes, captures, recovery
 * attempts and teardown never interleave for the same session.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether a task currently holds or waits for {@link key}. */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
