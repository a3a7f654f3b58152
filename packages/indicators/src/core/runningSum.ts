import { RingBuffer } from "./ringBuffer";

/**
 * Sum over the last `window` values. O(1) per push.
 */
export class RunningSum {
  private readonly values: RingBuffer;
  private total = 0;

  constructor(readonly window: number) {
    this.values = new RingBuffer(window);
  }

  push(value: number): void {
    this.total += value;
    const evicted = this.values.push(value);
    if (evicted !== undefined) {
      this.total -= evicted;
    }
  }

  get sum(): number {
    return this.total;
  }

  get count(): number {
    return this.values.length;
  }

  isFull(): boolean {
    return this.values.isFull();
  }

  /** Mean of the held values, NaN when empty */
  mean(): number {
    return this.values.length === 0 ? Number.NaN : this.total / this.values.length;
  }

  clear(): void {
    this.values.clear();
    this.total = 0;
  }
}

/**
 * Windowed sum and sum of squares for mean and population variance.
 */
export class RunningMoments {
  private readonly values: RingBuffer;
  private total = 0;
  private totalSquares = 0;

  constructor(readonly window: number) {
    this.values = new RingBuffer(window);
  }

  push(value: number): void {
    this.total += value;
    this.totalSquares += value * value;
    const evicted = this.values.push(value);
    if (evicted !== undefined) {
      this.total -= evicted;
      this.totalSquares -= evicted * evicted;
    }
  }

  get count(): number {
    return this.values.length;
  }

  isFull(): boolean {
    return this.values.isFull();
  }

  mean(): number {
    return this.values.length === 0 ? Number.NaN : this.total / this.values.length;
  }

  /** E[x²] - E[x]², floored at zero */
  variance(): number {
    const n = this.values.length;
    if (n === 0) {
      return Number.NaN;
    }
    const mean = this.total / n;
    return Math.max(0, this.totalSquares / n - mean * mean);
  }

  clear(): void {
    this.values.clear();
    this.total = 0;
    this.totalSquares = 0;
  }
}
