/**
 * Promise-chain mutex: callers of `runExclusive` run one at a time, in call order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }
}
