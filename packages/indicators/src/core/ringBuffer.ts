/**
 * Fixed-capacity ring buffer of numbers.
 *
 * `head` always points at the slot the next value is written to. Once the
 * buffer is full that slot holds the oldest value, which `push` returns.
 */
export class RingBuffer {
  private readonly buffer: number[];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    this.buffer = new Array<number>(capacity).fill(0);
  }

  /**
   * Append a value, returning the evicted value when the buffer was full.
   */
  push(value: number): number | undefined {
    let evicted: number | undefined;
    if (this.count === this.capacity) {
      evicted = this.buffer[this.head];
    } else {
      this.count++;
    }
    this.buffer[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  get length(): number {
    return this.count;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  /** Oldest value still held, undefined when empty */
  oldest(): number | undefined {
    if (this.count === 0) {
      return undefined;
    }
    return this.isFull() ? this.buffer[this.head] : this.buffer[0];
  }

  /** Values oldest first */
  toArray(): number[] {
    if (!this.isFull()) {
      return this.buffer.slice(0, this.count);
    }
    return [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
  }

  clear(): void {
    this.buffer.fill(0);
    this.head = 0;
    this.count = 0;
  }
}
