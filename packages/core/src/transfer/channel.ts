/**
 * Unbounded multi-producer, single-consumer async queue.
 *
 * `send` never blocks. `receive` resolves with the next value, or with a
 * done result once the channel is closed and drained. Values sent after
 * `close` are dropped.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private waiter: ((result: IteratorResult<T, undefined>) => void) | null =
    null;
  private closed = false;

  send(value: T): void {
    if (this.closed) return;
    const waiter = this.takeWaiter();
    if (waiter !== null) {
      waiter({ done: false, value });
    } else {
      this.buffer.push({ value });
    }
  }

  close(): void {
    this.closed = true;
    this.takeWaiter()?.({ done: true, value: undefined });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve({ done: false, value: next.value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error("Channel already has a receiver"));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const result = await this.receive();
      if (result.done) return;
      yield result.value;
    }
  }

  private takeWaiter() {
    const waiter = this.waiter;
    this.waiter = null;
    return waiter;
  }
}
