import { InvalidConfigError } from '../core/errors';

/**
 * Bounded drop-oldest channel between the engine and live consumers
 *
 * The producer never waits: when the buffer is full the oldest item is
 * discarded and counted in `droppedCount`.
 */
export class TelemetryChannel<T extends object> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private dropped = 0;
  private closed = false;
  private waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new InvalidConfigError(`Telemetry capacity must be a positive integer, got ${capacity}`, [
        'config.feedCapacity: must be a positive integer',
      ]);
    }
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.dropped++;
    }
    this.buffer.push(item);
    this.wake();
  }

  /**
   * Take everything currently buffered
   */
  drain(): T[] {
    const items = this.buffer;
    this.buffer = [];
    return items;
  }

  /**
   * Stop accepting items; iterators finish once the buffer is empty
   */
  close(): void {
    this.closed = true;
    this.wake();
  }

  get size(): number {
    return this.buffer.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = this.buffer.shift();
      if (next !== undefined) {
        yield next;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
