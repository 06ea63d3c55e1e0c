/**
 * Bounded Channel
 *
 * Single-consumer async queue between a subscription task and its consumer.
 * Overflow policy:
 * - 'block': push() resolves once the value fits; nothing is dropped.
 * - 'drop-oldest': push() never waits; the oldest buffered value is discarded.
 *
 * The consumer ending its iteration (break, return, or cancel()) is the
 * cancellation signal observed through onCancel().
 */

export type OverflowPolicy = 'block' | 'drop-oldest';

interface PendingPush<T> {
  value: T;
  resolve: () => void;
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly pending: PendingPush<T>[] = [];
  private readonly waiters: Array<{
    resolve: (result: IteratorResult<T>) => void;
    reject: (error: Error) => void;
  }> = [];
  private readonly cancelListeners: Array<() => void> = [];
  private closed = false;
  private failure: Error | null = null;
  private cancelledFlag = false;
  private droppedCount = 0;

  constructor(
    readonly capacity: number,
    readonly policy: OverflowPolicy
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get full(): boolean {
    return this.buffer.length >= this.capacity;
  }

  /** Values discarded under 'drop-oldest' */
  get dropped(): number {
    return this.droppedCount;
  }

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  /** False once closed, failed or cancelled */
  get open(): boolean {
    return !this.closed && !this.cancelledFlag;
  }

  /**
   * Offer a value. Values pushed after close or cancel are ignored.
   */
  push(value: T): Promise<void> {
    if (!this.open) return Promise.resolve();

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value });
      return Promise.resolve();
    }

    if (!this.full) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    if (this.policy === 'drop-oldest') {
      this.buffer.shift();
      this.buffer.push(value);
      this.droppedCount++;
      return Promise.resolve();
    }

    return new Promise((resolve) => this.pending.push({ value, resolve }));
  }

  /**
   * Producer is done; the consumer drains what is buffered, then finishes.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settleWaiters();
  }

  /**
   * Producer failed; the consumer drains what is buffered, then receives error.
   */
  fail(error: Error): void {
    if (this.closed) return;
    this.failure = error;
    this.closed = true;
    this.settleWaiters();
  }

  /**
   * Consumer is gone: discard buffered values and release blocked producers.
   */
  cancel(): void {
    if (this.cancelledFlag) return;
    this.cancelledFlag = true;
    this.buffer.length = 0;
    for (const push of this.pending.splice(0)) push.resolve();
    for (const waiter of this.waiters.splice(0)) waiter.resolve({ done: true, value: undefined });
    for (const listener of this.cancelListeners.splice(0)) listener();
  }

  onCancel(listener: () => void): void {
    if (this.cancelledFlag) {
      listener();
      return;
    }
    this.cancelListeners.push(listener);
  }

  next(): Promise<IteratorResult<T>> {
    if (this.cancelledFlag) {
      return Promise.resolve({ done: true, value: undefined });
    }

    const value = this.take();
    if (value !== undefined) {
      return Promise.resolve({ done: false, value: value.item });
    }

    if (this.closed) {
      if (this.failure) {
        const error = this.failure;
        this.failure = null;
        return Promise.reject(error);
      }
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: (): Promise<IteratorResult<T>> => {
        this.cancel();
        return Promise.resolve({ done: true, value: undefined });
      },
    };
  }

  private take(): { item: T } | undefined {
    if (this.buffer.length === 0) return undefined;
    const [item] = this.buffer.splice(0, 1);
    const blocked = this.pending.shift();
    if (blocked) {
      this.buffer.push(blocked.value);
      blocked.resolve();
    }
    return { item };
  }

  private settleWaiters(): void {
    if (this.buffer.length > 0) return;
    for (const waiter of this.waiters.splice(0)) {
      if (this.failure) {
        waiter.reject(this.failure);
        this.failure = null;
      } else {
        waiter.resolve({ done: true, value: undefined });
      }
    }
  }
}
