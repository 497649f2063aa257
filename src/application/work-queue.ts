interface Taker<T> {
  resolve(item: T | null): void;
  cleanup(): void;
}

/**
 * Async FIFO with task accounting, shaped after a join-able work queue:
 * every `put` counts as unfinished until the consumer calls `taskDone`,
 * and `join` resolves when the count returns to zero.
 *
 * `take` accepts a timeout and an abort signal and resolves `null` when
 * either fires first. `put` waits while `capacity` items are buffered.
 */
export class WorkQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly takers: Taker<T>[] = [];
  private readonly putters: Array<() => void> = [];
  private readonly drainWaiters: Array<() => void> = [];
  private unfinished = 0;

  constructor(private readonly capacity: number = Number.POSITIVE_INFINITY) {
    if (!(capacity > 0)) {
      throw new RangeError('WorkQueue capacity must be positive');
    }
  }

  /** Items buffered and not yet taken. */
  get size(): number {
    return this.items.length;
  }

  /** Items put and not yet marked done. */
  get pending(): number {
    return this.unfinished;
  }

  async put(item: T): Promise<void> {
    while (this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
    this.unfinished += 1;

    const taker = this.takers.shift();
    if (taker) {
      taker.cleanup();
      taker.resolve(item);
      return;
    }
    this.items.push({ value: item });
  }

  take(timeoutMs?: number, signal?: AbortSignal): Promise<T | null> {
    const head = this.items.shift();
    if (head) {
      this.putters.shift()?.();
      return Promise.resolve(head.value);
    }
    if (signal?.aborted || (timeoutMs !== undefined && timeoutMs <= 0)) {
      return Promise.resolve(null);
    }

    return new Promise<T | null>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = (): void => finish(null);

      const taker: Taker<T> = {
        resolve,
        cleanup: () => {
          if (timer !== undefined) clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      const finish = (value: T | null): void => {
        const index = this.takers.indexOf(taker);
        if (index === -1) return;
        this.takers.splice(index, 1);
        taker.cleanup();
        resolve(value);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => finish(null), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.takers.push(taker);
    });
  }

  taskDone(count = 1): void {
    if (count > this.unfinished) {
      throw new RangeError('taskDone() called more times than items were put');
    }
    this.unfinished -= count;
    if (this.unfinished === 0) {
      for (const wake of this.drainWaiters.splice(0)) wake();
    }
  }

  /** Resolves once every item put so far has been marked done. */
  join(): Promise<void> {
    if (this.unfinished === 0) return Promise.resolve();
    return new Promise<void>((resolve) => this.drainWaiters.push(resolve));
  }
}
