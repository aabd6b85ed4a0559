/**
 * Async mutual exclusion per key. Callers on the same key run one at a time in
 * arrival order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `work` while holding the lock for `key`.
   * Rejects with `onTimeout()` if the lock is not acquired within `timeoutMs`;
   * `work` is then never started.
   */
  async runExclusive<T>(
    key: string,
    work: () => Promise<T>,
    options: { timeoutMs?: number; onTimeout?: () => Error } = {}
  ): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    let acquired = false;
    try {
      await waitFor(previous, options.timeoutMs, options.onTimeout);
      acquired = true;
      return await work();
    } finally {
      release();
      if (acquired) {
        this.forget(key, tail);
      } else {
        // The holder ahead is still running; keep the chain until it finishes
        void tail.then(() => this.forget(key, tail));
      }
    }
  }

  /**
   * Whether anyone holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  private forget(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}

async function waitFor(
  previous: Promise<void>,
  timeoutMs: number | undefined,
  onTimeout: (() => Error) | undefined
): Promise<void> {
  if (timeoutMs === undefined) {
    await previous;
    return;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout ? onTimeout() : new Error(`Lock not acquired within ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    await Promise.race([previous, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
