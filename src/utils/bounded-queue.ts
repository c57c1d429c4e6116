/**
 * Bounded FIFO with an awaitable shift().
 *
 * Producers never block: when the queue is full the whole backlog is
 * dropped and the new item becomes the only entry. Consumers suspend in
 * shift() until an item arrives or their signal aborts.
 */

export type OverflowHandler = (dropped: number) => void;

interface Waiter<T> {
  resolve: (item: T) => void;
}

export class BoundedQueue<T> {
  private items: T[] = [];
  private head = 0;
  private waiters: Waiter<T>[] = [];
  private _dropped = 0;
  readonly capacity: number;

  constructor(capacity: number, private readonly onOverflow?: OverflowHandler) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  /** Total number of items discarded by overflow since construction */
  get dropped(): number {
    return this._dropped;
  }

  /**
   * Add an item. Returns false when the backlog had to be dropped to make
   * room; the item itself is always enqueued.
   */
  push(item: T): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(item);
      return true;
    }

    let accepted = true;
    if (this.size >= this.capacity) {
      const dropped = this.clear();
      this._dropped += dropped;
      accepted = false;
      this.onOverflow?.(dropped);
    }

    this.items.push(item);
    return accepted;
  }

  /**
   * Remove and return the oldest item, waiting for one if the queue is
   * empty. Rejects with the signal's reason when aborted.
   */
  shift(signal?: AbortSignal): Promise<T> {
    if (this.size > 0) {
      return Promise.resolve(this.take());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (item) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(item);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Drop every queued item. Returns how many were dropped. */
  clear(): number {
    const count = this.size;
    this.items = [];
    this.head = 0;
    return count;
  }

  /** Snapshot of queued items, oldest first. */
  toArray(): T[] {
    return this.items.slice(this.head);
  }

  private take(): T {
    const item = this.items[this.head];
    this.head += 1;

    // Compact once the consumed prefix dominates the array
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
}
