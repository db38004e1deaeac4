/**
 * Async FIFO with an optional bound. When full, the oldest buffered item is
 * dropped to make room; drops are counted so the consumer can be told it lagged.
 */

export type PushResult = 'accepted' | 'dropped-oldest' | 'closed';

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters = new Set<Waiter<T>>();
  private closed = false;
  private dropped = 0;

  constructor(private readonly capacity: number = Infinity) {
    if (capacity < 1) throw new RangeError(`Channel capacity must be at least 1, got ${capacity}`);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  push(item: T): PushResult {
    if (this.closed) return 'closed';

    const [waiter] = this.waiters;
    if (waiter) {
      this.waiters.delete(waiter);
      waiter.resolve({ done: false, value: item });
      return 'accepted';
    }

    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.dropped++;
      return 'dropped-oldest';
    }
    return 'accepted';
  }

  /** Number of items dropped since the last call. */
  takeDropped(): number {
    const n = this.dropped;
    this.dropped = 0;
    return n;
  }

  /** Buffered items are still delivered after close; then the channel reports done. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) waiter.resolve(DONE);
    this.waiters.clear();
  }

  next(signal?: AbortSignal): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      return Promise.resolve({ done: false, value });
    }
    if (this.closed || signal?.aborted) return Promise.resolve(DONE);

    return new Promise((resolve) => {
      const onAbort = (): void => {
        this.waiters.delete(waiter);
        resolve(DONE);
      };
      const waiter: Waiter<T> = {
        resolve: (result) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(result);
        },
      };
      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  iterate(signal?: AbortSignal): AsyncIterable<T> {
    return {
      [Symbol.asyncIterator]: () => ({
        next: () => this.next(signal),
      }),
    };
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
