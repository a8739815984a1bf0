/**
 * Single-consumer async channel.
 *
 * The node pushes statuses as they happen; one consumer drains them with
 * `for await`. Values pushed before the consumer arrives are buffered.
 * Breaking out of the loop cancels the channel: later pushes return false.
 */

import { RuntimeError } from "./types.js";

export class StatusChannel<T> implements AsyncIterable<T> {
  private readonly _buffer: { readonly value: T }[] = [];
  private _waiter: ((result: IteratorResult<T>) => void) | undefined;
  private _closed = false;
  private _cancelled = false;
  private _iterated = false;

  /**
   * Deliver a value. Returns false once the channel is closed or cancelled.
   */
  push(value: T): boolean {
    if (this._closed) {
      return false;
    }
    const waiter = this._waiter;
    if (waiter !== undefined) {
      this._waiter = undefined;
      waiter({ value, done: false });
    } else {
      this._buffer.push({ value });
    }
    return true;
  }

  /** End the stream. Buffered values are still delivered. */
  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;
    this._settleWaiter();
  }

  get closed(): boolean {
    return this._closed;
  }

  /** True when the consumer stopped listening before the stream ended. */
  get cancelled(): boolean {
    return this._cancelled;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this._iterated) {
      throw new RuntimeError("STREAM_CONSUMED", "Status stream can only be consumed once");
    }
    this._iterated = true;

    return {
      next: (): Promise<IteratorResult<T>> => {
        const item = this._buffer.shift();
        if (item !== undefined) {
          return Promise.resolve({ value: item.value, done: false });
        }
        if (this._closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this._waiter = resolve;
        });
      },
      return: (): Promise<IteratorResult<T>> => {
        if (!this._closed) {
          this._cancelled = true;
          this._closed = true;
        }
        this._buffer.length = 0;
        this._settleWaiter();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }

  private _settleWaiter(): void {
    const waiter = this._waiter;
    if (waiter !== undefined) {
      this._waiter = undefined;
      waiter({ value: undefined, done: true });
    }
  }
}
