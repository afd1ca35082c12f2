/**
 * AsyncQueue - single-consumer queue that can be drained with `for await`.
 *
 * Producers (stdin data, terminal resize) push from event callbacks; the
 * presenter loop pulls one item at a time and only suspends while the
 * queue is empty.
 */

export class AsyncQueue<T> implements AsyncIterable<T> {
  private pending: T[] = [];
  private resolveNext: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;

  /**
   * Enqueue an item, handing it straight to a waiting consumer if there is one.
   * Items pushed after close() are dropped.
   */
  push(item: T): void {
    if (this.closed) return;
    if (this.resolveNext) {
      const resolve = this.resolveNext;
      this.resolveNext = null;
      resolve({ value: item, done: false });
      return;
    }
    this.pending.push(item);
  }

  /**
   * End the stream. Items already queued are still delivered.
   */
  close(): void {
    this.closed = true;
    if (this.resolveNext) {
      const resolve = this.resolveNext;
      this.resolveNext = null;
      resolve({ value: undefined, done: true });
    }
  }

  get size(): number {
    return this.pending.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.pending.length > 0) {
          const [item] = this.pending.splice(0, 1);
          return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.resolveNext = resolve;
        });
      },
      return: (): Promise<IteratorResult<T>> => {
        this.close();
        this.pending = [];
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
