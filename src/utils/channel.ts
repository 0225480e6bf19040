/**
 * Bounded single-consumer async channel.
 *
 * The producer awaits `send()`, which blocks while the buffer is full and
 * resolves false once the consumer has gone away. The consumer iterates with
 * `for await`; breaking out of the loop detaches it, wakes any blocked
 * producer and aborts `signal` so in-flight reads can be cancelled.
 */

interface Slot<T> {
  value: T;
}

export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Slot<T>[] = [];
  private readonly detachController = new AbortController();
  private closed = false;
  private failure: { error: unknown } | null = null;
  private consumerWaiter: (() => void) | null = null;
  private producerWaiters: Array<() => void> = [];
  private iterating = false;

  constructor(readonly capacity = 32) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer; got ${capacity}`);
    }
  }

  /** Aborted when the consumer stops reading. */
  get signal(): AbortSignal {
    return this.detachController.signal;
  }

  get isDetached(): boolean {
    return this.detachController.signal.aborted;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items buffered but not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  async send(value: T): Promise<boolean> {
    while (!this.isDetached && !this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.producerWaiters.push(resolve));
    }
    if (this.isDetached || this.closed) return false;
    this.buffer.push({ value });
    this.wakeConsumer();
    return true;
  }

  /**
   * End the channel. Buffered items are still delivered; after them the
   * consumer's iteration ends, or throws `error` when one is given.
   */
  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };
    this.wakeConsumer();
    this.wakeProducers();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) throw new Error("Channel already has a consumer");
    this.iterating = true;
    return {
      next: () => this.receive(),
      return: async () => {
        this.detach();
        return { done: true, value: undefined };
      },
    };
  }

  private async receive(): Promise<IteratorResult<T>> {
    for (;;) {
      const slot = this.buffer.shift();
      if (slot) {
        this.wakeProducers();
        return { done: false, value: slot.value };
      }
      if (this.closed || this.isDetached) {
        const failure = this.failure;
        this.failure = null;
        if (failure) throw failure.error;
        return { done: true, value: undefined };
      }
      await new Promise<void>((resolve) => { this.consumerWaiter = resolve; });
    }
  }

  private detach(): void {
    if (this.isDetached) return;
    this.buffer.length = 0;
    this.detachController.abort();
    this.wakeProducers();
  }

  private wakeConsumer(): void {
    const waiter = this.consumerWaiter;
    this.consumerWaiter = null;
    waiter?.();
  }

  private wakeProducers(): void {
    const waiters = this.producerWaiters;
    this.producerWaiters = [];
    for (const w of waiters) w();
  }
}
