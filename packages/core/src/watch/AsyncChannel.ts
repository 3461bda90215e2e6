export type PushOutcome = "queued" | "duplicate" | "overflow" | "closed";

/**
 * Bounded single-consumer queue. Pushing a value that is already waiting is a
 * no-op, and pushes beyond `capacity` are refused rather than blocking.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  constructor(
    private capacity: number,
    private keyOf: (value: T) => string = String,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): PushOutcome {
    if (this.closed) return "closed";
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
      return "queued";
    }
    const key = this.keyOf(value);
    if (this.queue.some((queued) => this.keyOf(queued) === key)) return "duplicate";
    if (this.queue.length >= this.capacity) return "overflow";
    this.queue.push(value);
    return "queued";
  }

  /** Stops accepting values. Values already queued are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.queue.length > 0) {
      const [value] = this.queue.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
