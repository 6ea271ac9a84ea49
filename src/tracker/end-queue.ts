/**
 * Single-consumer FIFO of end requests. `push` never blocks; `next` waits
 * until an item arrives or the queue is closed and drained.
 */
export class EndQueue<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the queue no longer accepts items. */
  push(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /** Resolves `undefined` once the queue is closed and empty. */
  next(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      throw new Error('EndQueue supports a single consumer');
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(undefined);
    }
  }
}
