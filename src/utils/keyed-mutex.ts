/**
 * Per-key promise-chain mutex.
 *
 * Critical sections for the same key run one after another in call
 * order; sections for different keys never wait on each other. The
 * chain entry is dropped once its tail settles, so idle keys cost
 * nothing.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, section: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseNext: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await previous;
      return await section();
    } finally {
      releaseNext();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get size(): number {
    return this.tails.size;
  }
}
