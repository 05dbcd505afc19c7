import type { EventSink } from "./event-bus.js";

/**
 * Bounded, drop-on-full async queue.
 *
 * `offer` never blocks: when `capacity` items are already buffered (or the
 * channel is closed) it returns false and the item is dropped. Consumers pull
 * with `take(timeoutMs)` or iterate with `for await`.
 *
 * Usage:
 *   const channel = new EventChannel<BreakerEvent>(8);
 *   breaker.events.subscribe(channel, { only: ["state-transition"] });
 *   const event = await channel.take(100);   // undefined on timeout
 */
export class EventChannel<T> implements EventSink<T>, AsyncIterable<T> {
  private readonly queue: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private closed = false;

  constructor(readonly capacity = 16) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("EventChannel capacity must be a positive integer");
    }
  }

  /** Hand an item to a waiting consumer or buffer it. Returns false if dropped. */
  offer(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }
    if (this.queue.length >= this.capacity) return false;
    this.queue.push(item);
    return true;
  }

  /**
   * Resolve with the next item. Resolves undefined when `timeoutMs` elapses
   * first, or once the channel is closed and drained.
   */
  take(timeoutMs?: number): Promise<T | undefined> {
    if (this.queue.length > 0) return Promise.resolve(this.queue.shift());
    if (this.closed) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter = (item: T | undefined) => {
        if (timer) clearTimeout(timer);
        resolve(item);
      };
      this.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(undefined);
        }, timeoutMs);
      }
    });
  }

  /** Stop accepting items. Buffered items can still be taken. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(undefined);
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: async (): Promise<IteratorResult<T>> => {
        const item = await this.take();
        if (item === undefined) return { value: undefined, done: true };
        return { value: item, done: false };
      },
    };
  }
}
