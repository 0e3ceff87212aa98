/**
 * AsyncMessageQueue<T>: unbounded FIFO with many producers and one
 * `for await` consumer.
 *
 * Usage:
 *   const queue = new AsyncMessageQueue<ExecutionTask>();
 *   queue.enqueue(task);      // producer side, any number of callers
 *   queue.finish();           // signal end of stream
 *   for await (const task of queue) { ... }  // the single consumer
 */

export class AsyncMessageQueue<T> {
  private readonly queue: T[] = [];
  private resolve: ((value: IteratorResult<T>) => void) | null = null;
  private done = false;

  /**
   * Push an item, waking the consumer if it is waiting.
   * Returns false once the queue is finished.
   */
  enqueue(item: T): boolean {
    if (this.done) return false;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: item, done: false });
    } else {
      this.queue.push(item);
    }
    return true;
  }

  /** Signal that no more items will be produced. Buffered items are still yielded. */
  finish(): void {
    if (this.done) return;
    this.done = true;

    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: undefined, done: true });
    }
  }

  /** Remove and return every buffered item, oldest first. */
  takeAll(): T[] {
    return this.queue.splice(0, this.queue.length);
  }

  /** Items buffered and not yet taken by the consumer. */
  get size(): number {
    return this.queue.length;
  }

  get isFinished(): boolean {
    return this.done;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.queue.length > 0) {
          const [head] = this.queue.splice(0, 1);
          return Promise.resolve({ value: head, done: false });
        }
        if (this.done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.resolve = resolve;
        });
      },
    };
  }
}
