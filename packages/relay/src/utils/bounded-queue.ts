/**
 * @file bounded-queue.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Outcome of {@link BoundedQueue.offer}.
 */
export type OfferResult = 'queued' | 'full' | 'closed';

/**
 * Single-consumer async queue bridging push-based producers with one
 * pull-based consumer.
 *
 * `offer` never waits: a waiting consumer receives the item directly, otherwise
 * it is buffered while fewer than `capacity` items are buffered. After `close`,
 * buffered items are still handed out, then consumers see the end of the stream.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;

  constructor(readonly capacity = Number.POSITIVE_INFINITY) {
    if (!(capacity > 0)) {
      throw new RangeError('BoundedQueue capacity must be positive');
    }
  }

  /** Items buffered and not yet taken. */
  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(item: T): OfferResult {
    if (this.closed) return 'closed';

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return 'queued';
    }

    if (this.items.length >= this.capacity) return 'full';

    this.items.push(item);
    return 'queued';
  }

  /**
   * Resolves with the next item, or `done` once the queue is closed and empty.
   */
  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const value = this.items[0];
      this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stops accepting items. Pending consumers are released.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /**
   * Closes the queue and discards everything still buffered.
   * Returns the number of discarded items.
   */
  discard(): number {
    this.close();
    return this.items.splice(0).length;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.next();
      if (result.done) return;
      yield result.value;
    }
  }
}
