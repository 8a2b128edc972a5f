/**
 * Bounded single-consumer queue between browser listeners and the session's
 * collection loop. Listeners only ever push; classification happens on the
 * consumer side.
 *
 * When the buffer is full the newest item is dropped and counted.
 */
export class DiagnosticChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private dropped = 0;

  constructor(private readonly capacity = 1000) {
    if (capacity < 1) {
      throw new Error('Channel capacity must be at least 1');
    }
  }

  /**
   * Returns false when the item was dropped (channel closed or full)
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: item, done: false });
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      this.dropped += 1;
      return false;
    }
    this.buffer.push(item);
    return true;
  }

  /**
   * No more pushes are accepted; buffered items are still delivered
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('DiagnosticChannel supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.buffer.length;
  }
}
