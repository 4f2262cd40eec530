// src/core/run/channel.ts
import { PROGRESS_CHANNEL_CAPACITY } from '../config/constants.js';

/**
 * Bounded single-producer, single-consumer queue. `push` waits while the
 * buffer is full; iteration ends once the channel is closed and drained.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private closed = false;
  private waitingReader?: (result: IteratorResult<T, undefined>) => void;
  private waitingWriters: Array<() => void> = [];

  constructor(private readonly capacity: number = PROGRESS_CHANNEL_CAPACITY) {
    if (capacity < 1) {
      throw new Error(`Channel capacity must be at least 1, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  async push(item: T): Promise<void> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.waitingWriters.push(resolve));
    }
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }

    const reader = this.waitingReader;
    if (reader) {
      this.waitingReader = undefined;
      reader({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const reader = this.waitingReader;
    if (reader && this.buffer.length === 0) {
      this.waitingReader = undefined;
      reader({ value: undefined, done: true });
    }
    for (const writer of this.waitingWriters.splice(0)) {
      writer();
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.waitingWriters.shift()?.();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waitingReader) {
      return Promise.reject(new Error('Channel already has a pending reader'));
    }
    return new Promise((resolve) => {
      this.waitingReader = resolve;
    });
  }

  /** Consume everything until the channel closes */
  async drain(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
