/**
 * Unbounded push queue consumed as an async iterable.
 * Items pushed before anyone reads are buffered; `end()` lets pending and
 * future reads finish once the buffer drains.
 */
export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private items: T[] = [];
  private waiting: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private ended = false;
  private onEnd?: () => void;

  constructor(onEnd?: () => void) {
    this.onEnd = onEnd;
  }

  push(item: T): void {
    if (this.ended) return;
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiting.splice(0)) {
      waiter({ value: undefined, done: true });
    }
    this.onEnd?.();
  }

  isEnded(): boolean {
    return this.ended;
  }

  /** Items buffered but not yet read */
  size(): number {
    return this.items.length;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.waiting.push(resolve));
  }

  /**
   * Called when a `for await` loop exits early.
   */
  return(): Promise<IteratorResult<T, undefined>> {
    this.items = [];
    this.end();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
