/**
 * AsyncQueue — unbounded push-based async iterator
 *
 * Producers push() synchronously; a single consumer pulls with for-await.
 * Values are yielded in push order. end() completes the iteration once the
 * buffer is drained; fail() rejects the consumer after the buffer is drained.
 */
interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: unknown) => void;
}

export class AsyncQueue<T extends object> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private ended = false;
  private failure: { error: unknown } | null = null;

  get isEnded(): boolean {
    return this.ended;
  }

  /** Append a value. Returns false if the queue has already ended. */
  push(value: T): boolean {
    if (this.ended) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** Complete the iteration after buffered values are consumed */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** Terminate the iteration with an error after buffered values are consumed */
  fail(error: unknown): void {
    if (this.ended) return;
    this.ended = true;
    this.failure = { error };
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }

    if (this.failure) {
      const { error } = this.failure;
      // Surface the failure once; later pulls just see the end
      this.failure = null;
      return Promise.reject(error);
    }

    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Called when the consumer stops early (break / return in for-await) */
  return(): Promise<IteratorResult<T>> {
    this.ended = true;
    this.buffer.length = 0;
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
