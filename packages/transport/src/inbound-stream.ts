/**
 * Single-consumer async queue behind PeerClient.receive().
 *
 * Items pushed before anyone awaits are buffered; a pending next() is
 * resolved directly. Once ended the stream stays ended.
 */
export class InboundStream<T> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;
  private dropped = 0;

  constructor(
    private readonly maxBuffered: number = 4096,
    private readonly onOverflow?: (droppedTotal: number) => void
  ) {}

  push(item: T): void {
    if (this.ended) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }

    this.buffer.push(item);
    if (this.buffer.length > this.maxBuffered) {
      this.buffer.shift();
      this.dropped++;
      this.onOverflow?.(this.dropped);
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /** Items waiting for a consumer */
  get size(): number {
    return this.buffer.length;
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  return(): Promise<IteratorResult<T>> {
    this.end();
    this.buffer = [];
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
