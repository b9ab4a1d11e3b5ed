import { TwinError } from "../utils/errors.js";

/**
 * Bridges push-style platform callbacks to a pull-style async sequence with
 * exactly one consumer. Items pushed before the consumer attaches are
 * buffered; `close()` ends the sequence once the buffer drains.
 */
export class InboundStream<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private waiter: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private consumed = false;

  constructor(private readonly name: string) {}

  /** Returns false once the stream is closed. */
  push(value: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.consumed) {
      throw new TwinError("stream_consumed", `Inbound stream for ${this.name} already has a consumer`);
    }
    this.consumed = true;

    return {
      next: (): Promise<IteratorResult<T>> => {
        const head = this.buffer.shift();
        if (head) return Promise.resolve({ value: head.value, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
          this.waiter = resolve;
        });
      },
      return: (): Promise<IteratorResult<T>> => {
        this.close();
        this.buffer.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
