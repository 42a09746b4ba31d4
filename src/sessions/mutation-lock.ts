/**
 * Serializes index mutations using promise chaining.
 * Each run() appends to the chain, so work never interleaves.
 */
export class MutationLock {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const prev = this.tail;

    let release: () => void = () => undefined;
    const done = new Promise<void>((r) => {
      release = r;
    });
    this.tail = done;

    try {
      await prev;
      return await fn();
    } finally {
      release();
    }
  }
}
