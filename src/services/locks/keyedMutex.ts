export interface MutexWait {
  /** Longest time to queue behind earlier callers of the same key. */
  ms: number;
  onTimeout: () => Error;
}

/**
 * In-process mutual exclusion per key. Callers for the same key run one after
 * another in arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>, wait?: MutexWait): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    try {
      await this.waitFor(previous, wait);
    } catch (error) {
      // Give up the slot; callers behind still wait for the holder
      release();
      void tail.then(() => this.forget(key, tail));
      throw error;
    }

    try {
      return await task();
    } finally {
      release();
      this.forget(key, tail);
    }
  }

  get size(): number {
    return this.tails.size;
  }

  private async waitFor(previous: Promise<void>, wait: MutexWait | undefined): Promise<void> {
    if (!wait) {
      return previous;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(wait.onTimeout()), wait.ms);
    });
    try {
      await Promise.race([previous, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private forget(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
