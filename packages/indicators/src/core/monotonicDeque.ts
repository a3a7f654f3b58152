export type DequeMode = "max" | "min";

/**
 * Sliding-window maximum or minimum in amortised O(1).
 *
 * Entries are (index, value) pairs kept in dominance order. The index is a
 * counter that only grows; eviction compares against it, so it must never
 * wrap even though the window is bounded.
 */
export class MonotonicDeque {
  private indices: number[] = [];
  private values: number[] = [];
  private front = 0;
  private nextIndex = 0;

  constructor(
    readonly mode: DequeMode,
    readonly window: number
  ) {}

  push(value: number): void {
    const index = this.nextIndex++;
    while (this.values.length > this.front && this.dominates(value, this.values[this.values.length - 1])) {
      this.indices.pop();
      this.values.pop();
    }
    this.indices.push(index);
    this.values.push(value);

    while (this.indices[this.front] <= index - this.window) {
      this.front++;
    }
    this.compact();
  }

  /** Current extreme of the window, NaN when empty */
  peek(): number {
    return this.values.length > this.front ? this.values[this.front] : Number.NaN;
  }

  /** Number of values pushed since the last clear */
  get seen(): number {
    return this.nextIndex;
  }

  clear(): void {
    this.indices = [];
    this.values = [];
    this.front = 0;
    this.nextIndex = 0;
  }

  private dominates(incoming: number, back: number): boolean {
    return this.mode === "max" ? back <= incoming : back >= incoming;
  }

  // Drop the consumed prefix once it outweighs the live entries.
  private compact(): void {
    if (this.front > 32 && this.front * 2 > this.values.length) {
      this.indices = this.indices.slice(this.front);
      this.values = this.values.slice(this.front);
      this.front = 0;
    }
  }
}
