// Unbounded multi-producer single-consumer queue behind the in-memory and SSE sessions.

interface Waiter<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: Error) => void;
}

export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly waiters: Array<Waiter<T>> = [];
  private closed = false;
  private failure: Error | null = null;

  // Returns false once the queue is closed.
  public push(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value });
      return true;
    }

    this.buffer.push({ value });
    return true;
  }

  // Buffered values are still drained after close; only then does iteration end.
  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ done: true, value: undefined });
    }
  }

  // Ends the queue with an error that the consumer sees after the buffered values.
  public fail(error: Error): void {
    if (this.closed) {
      return;
    }

    this.failure = error;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  public get length(): number {
    return this.buffer.length;
  }

  public next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item) {
      return Promise.resolve({ done: false, value: item.value });
    }

    if (this.failure) {
      return Promise.reject(this.failure);
    }

    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
