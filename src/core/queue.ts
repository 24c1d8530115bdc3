interface Waiter<T> {
  resolve: (value: T) => void;
}

/**
 * Bounded FIFO channel between async producers and consumers.
 *
 * - `push` suspends while the queue is full and resolves `false` once the
 *   queue is closed (the item is dropped).
 * - `pop` suspends while the queue is empty and resolves `undefined` once
 *   the queue is closed and empty.
 *
 * Items are handed out in the order they became available; nothing is
 * promised about the order in which consumers finish with them.
 */
export class BoundedQueue<T> {
  readonly capacity: number;
  private readonly items: T[] = [];
  private readonly consumers: Waiter<T | undefined>[] = [];
  private readonly producers: Array<Waiter<boolean> & { item: T }> = [];
  private isClosed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  /** Producers currently suspended on a full queue */
  get blockedProducers(): number {
    return this.producers.length;
  }

  push(item: T): Promise<boolean> {
    if (this.isClosed) return Promise.resolve(false);
    if (this.handOff(item)) return Promise.resolve(true);
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      this.producers.push({ item, resolve });
    });
  }

  /** Non-blocking push: `false` when full or closed. */
  tryPush(item: T): boolean {
    if (this.isClosed) return false;
    if (this.handOff(item)) return true;
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  pop(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitProducer();
      return Promise.resolve(item);
    }
    if (this.isClosed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.consumers.push({ resolve });
    });
  }

  /**
   * Stop accepting items. Suspended producers resolve `false`; consumers
   * keep receiving what is already queued, then `undefined`.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const producer of this.producers.splice(0)) producer.resolve(false);
    for (const consumer of this.consumers.splice(0)) consumer.resolve(undefined);
  }

  /** Remove and return everything still queued. */
  drain(): T[] {
    const pending = this.items.splice(0);
    while (this.admitProducer()) {
      pending.push(...this.items.splice(0));
    }
    return pending;
  }

  private handOff(item: T): boolean {
    const consumer = this.consumers.shift();
    if (!consumer) return false;
    consumer.resolve(item);
    return true;
  }

  private admitProducer(): boolean {
    if (this.items.length >= this.capacity) return false;
    const producer = this.producers.shift();
    if (!producer) return false;
    this.items.push(producer.item);
    producer.resolve(true);
    return true;
  }
}
