type PendingReceive<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: Error) => void;
};

/**
 * Single-consumer async channel holding at most `capacity` undelivered items.
 * `send` waits while the channel is full and resolves to `false` once the
 * channel has been closed or failed, so producers can stop quietly.
 */
export class BoundedChannel<T extends {}> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly waitingSenders: Array<() => void> = [];
  private receiver?: PendingReceive<T>;
  private closed = false;
  private failure?: Error;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Channel capacity must be a positive integer (got ${capacity})`);
    }
  }

  get size() {
    return this.items.length;
  }

  async send(item: T): Promise<boolean> {
    while (!this.closed && !this.receiver && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.waitingSenders.push(resolve));
    }
    if (this.closed) return false;
    const receiver = this.receiver;
    if (receiver) {
      this.receiver = undefined;
      receiver.resolve({ value: item, done: false });
      return true;
    }
    this.items.push(item);
    return true;
  }

  receive(): Promise<IteratorResult<T>> {
    if (this.receiver) {
      return Promise.reject(new Error("BoundedChannel supports a single consumer"));
    }
    const item = this.items.shift();
    if (item !== undefined) {
      this.waitingSenders.shift()?.();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.receiver = { resolve, reject };
    });
  }

  /** Ends the channel; items already queued are still delivered. */
  close() {
    if (this.closed) return;
    this.closed = true;
    this.wakeAll();
    const receiver = this.receiver;
    this.receiver = undefined;
    receiver?.resolve({ value: undefined, done: true });
  }

  /**
   * Ends the channel with an error. Queued items are delivered before the
   * error unless `discard` is set, in which case they are dropped.
   */
  fail(err: Error, opts: { discard?: boolean } = {}) {
    if (opts.discard) this.items.length = 0;
    if (this.closed) {
      if (opts.discard && !this.failure) this.failure = err;
      return;
    }
    this.closed = true;
    this.failure = err;
    this.wakeAll();
    const receiver = this.receiver;
    this.receiver = undefined;
    receiver?.reject(err);
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive()
    };
  }

  private wakeAll() {
    const senders = this.waitingSenders.splice(0);
    for (const wake of senders) wake();
  }
}
