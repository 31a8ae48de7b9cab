// Promise-chain mutex: callers run one at a time, in arrival order

export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run fn once every earlier caller has settled
   * The lock is released whether fn resolves or rejects
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await fn();
    } finally {
      release();
    }
  }
}
