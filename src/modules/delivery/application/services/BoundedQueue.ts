interface PendingPut<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

/**
 * BoundedQueue
 *
 * FIFO queue with a fixed capacity shared by async producers and consumers.
 *
 * - `put` waits while the queue is full and resolves `true` once the item is
 *   queued, or `false` if the queue was closed first
 * - `take` waits while the queue is empty and resolves `undefined` once the
 *   queue is closed and empty
 * - `close` stops accepting items; queued items can still be taken
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private readonly putters: Array<PendingPut<T>> = [];
  private closed = false;

  public constructor(private readonly capacity: number) {}

  public put(item: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return Promise.resolve(true);
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      this.putters.push({ item, resolve });
    });
  }

  public take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.admitPutter();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const putter of this.putters.splice(0)) {
      putter.resolve(false);
    }
    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
  }

  /**
   * Removes and returns every queued item
   */
  public drain(): T[] {
    const drained = this.items.splice(0);
    for (const putter of this.putters.splice(0)) {
      drained.push(putter.item);
      putter.resolve(true);
    }
    return drained;
  }

  public get size(): number {
    return this.items.length;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  private admitPutter(): void {
    const putter = this.putters.shift();
    if (putter) {
      this.items.push(putter.item);
      putter.resolve(true);
    }
  }
}
