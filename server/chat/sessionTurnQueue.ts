export type ReleaseTurn = () => void;

/**
 * Lets turns that share a session id run one after another. Keys whose chain
 * has drained are forgotten, so the map only holds sessions with work pending.
 */
export class SessionTurnQueue {
  private tails = new Map<string, Promise<void>>();

  /** Resolves once every earlier holder of `key` has released. Releasing twice is a no-op. */
  async acquire(key: string): Promise<ReleaseTurn> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let signal: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      signal = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    await previous;
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      signal();
    };
  }

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  pendingKeys(): number {
    return this.tails.size;
  }
}
