import type { ItemRef, LogLevel, Outcome, ProgressEvent } from './types.js';

type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded FIFO with many producers and a single consumer that can either poll
 * (`drain`) or await items one by one.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];

  private readonly waiters: Waiter<T>[] = [];

  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Returns false when the queue is already closed and the item was not accepted.
   */
  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
    } else {
      this.items.push(item);
    }
    return true;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    if (this.closed) {
      return Promise.resolve({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter({ done: true, value: undefined });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}

/**
 * One-way event stream from workers to whichever front end renders the batch.
 */
export class ProgressChannel implements AsyncIterable<ProgressEvent> {
  private readonly queue = new AsyncQueue<ProgressEvent>();

  emit(event: ProgressEvent): void {
    this.queue.push(event);
  }

  log(message: string, level: LogLevel = 'info'): void {
    this.emit({ type: 'log', level, message });
  }

  progress(fraction: number, item?: ItemRef): void {
    const clamped = Math.min(1, Math.max(0, fraction));
    this.emit(item ? { type: 'progress', fraction: clamped, item } : { type: 'progress', fraction: clamped });
  }

  status(text: string): void {
    this.emit({ type: 'status', text });
  }

  itemStarted(item: ItemRef): void {
    this.emit({ type: 'item', phase: 'started', item });
  }

  itemFinished(item: ItemRef, outcome: Outcome): void {
    this.emit({ type: 'item', phase: 'finished', item, outcome });
  }

  /**
   * Emits the terminal event and closes the stream; later events are dropped.
   */
  done(status: string): void {
    this.emit({ type: 'done', status, progress: 0 });
    this.queue.close();
  }

  get isClosed(): boolean {
    return this.queue.isClosed;
  }

  drain(): ProgressEvent[] {
    return this.queue.drain();
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent, undefined> {
    return this.queue[Symbol.asyncIterator]();
  }
}
