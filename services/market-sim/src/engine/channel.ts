type Waiter<T> = {
  resolve: (r: IteratorResult<T, undefined>) => void;
  reject: (err: unknown) => void;
};

/**
 * Bounded single-producer/single-consumer hand-off.
 *
 * `send` resolves once the value is buffered; while the buffer is full it waits
 * for the consumer, so a slow reader slows the producer down instead of losing
 * values. It resolves false when the channel closed or the signal aborted
 * before the value was accepted.
 */
export class TickChannel<T extends object> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly readers: Waiter<T>[] = [];
  private readonly writers: Array<() => void> = [];
  private closed = false;
  private failure: { err: unknown } | undefined;

  constructor(
    private readonly capacity = 64,
    private readonly onReturn?: () => void,
  ) {
    if (!(capacity >= 1)) throw new RangeError(`capacity must be >= 1, got ${capacity}`);
  }

  get size() {
    return this.buffer.length;
  }

  get isClosed() {
    return this.closed;
  }

  async send(value: T, signal?: AbortSignal): Promise<boolean> {
    while (!this.closed && !signal?.aborted && this.buffer.length >= this.capacity) {
      await this.waitForRoom(signal);
    }
    if (this.closed || signal?.aborted) return false;

    const reader = this.readers.shift();
    if (reader) reader.resolve({ value, done: false });
    else this.buffer.push(value);
    return true;
  }

  /** No more values; buffered ones are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeWriters();
    for (const r of this.readers.splice(0)) r.resolve({ value: undefined, done: true });
  }

  /** Closes the channel and makes the consumer's next read reject with `err`. */
  fail(err: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeWriters();
    const waiting = this.readers.splice(0);
    if (waiting.length === 0) this.failure = { err };
    for (const r of waiting) r.reject(err);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      this.wakeWriters();
      return Promise.resolve({ value, done: false });
    }
    if (this.failure) {
      const { err } = this.failure;
      this.failure = undefined;
      return Promise.reject(err);
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => this.readers.push({ resolve, reject }));
  }

  /** Closes the channel and discards whatever the consumer has not read yet. */
  drop(): void {
    this.buffer.length = 0;
    this.failure = undefined;
    this.close();
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.drop();
    this.onReturn?.();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private waitForRoom(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        signal?.removeEventListener('abort', done);
        resolve();
      };
      this.writers.push(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  private wakeWriters() {
    for (const w of this.writers.splice(0)) w();
  }
}
