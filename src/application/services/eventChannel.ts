/**
 * Single-producer, single-consumer channel: pushes never wait, the consumer drains in push order.
 * Once the consumer detaches (stops iterating), further pushes are dropped.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private detached = false;
  private iterating = false;

  get isDetached(): boolean {
    return this.detached;
  }

  push(value: T): boolean {
    if (this.closed || this.detached) {
      return false;
    }

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value, done: false });
      return true;
    }

    this.buffer.push(value);
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) {
      throw new Error("EventChannel supports a single consumer.");
    }
    this.iterating = true;

    return {
      next: () => {
        if (this.buffer.length > 0) {
          const [value] = this.buffer.splice(0, 1);
          return Promise.resolve({ value, done: false });
        }

        if (this.closed || this.detached) {
          return Promise.resolve({ value: undefined, done: true });
        }

        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiting = resolve;
        });
      },
      return: () => {
        this.detach();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  /**
   * Drops buffered values and ends iteration; the producer learns about it through `isDetached`.
   */
  detach(): void {
    this.detached = true;
    this.buffer.length = 0;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }
}
