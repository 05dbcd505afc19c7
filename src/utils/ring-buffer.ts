/**
 * Generic fixed-capacity circular buffer.
 * When full, new items overwrite the oldest entry; `push` hands the
 * overwritten item back so callers can maintain running aggregates.
 */
export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0; // next write position
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("RingBuffer capacity must be a positive integer");
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /** Append an item. Returns the evicted item once the buffer is full, else undefined. */
  push(item: T): T | undefined {
    const evicted = this.count === this.capacity ? this.buffer[this.head] : undefined;
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
    return evicted;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
