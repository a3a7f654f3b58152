/**
 * Incremental Primitive Tests
 */

import { describe, expect, it } from "vitest";
import { MonotonicDeque } from "../src/core/monotonicDeque";
import { RingBuffer } from "../src/core/ringBuffer";
import { RunningMoments, RunningSum } from "../src/core/runningSum";
import { candlesFromArrays, hlcBars, medianPrice, trueRange, typicalPrice } from "../src/core/series";
import { WilderSmoother } from "../src/core/wilder";
import { InvalidParameterError } from "../src/errors";
import { seededRandom } from "./test-utils";

describe("RingBuffer", () => {
  it("should return the evicted value once full", () => {
    const buffer = new RingBuffer(3);
    expect(buffer.push(1)).toBeUndefined();
    expect(buffer.push(2)).toBeUndefined();
    expect(buffer.push(3)).toBeUndefined();
    expect(buffer.push(4)).toBe(1);
    expect(buffer.push(5)).toBe(2);
  });

  it("should list values oldest first", () => {
    const buffer = new RingBuffer(3);
    buffer.push(1);
    buffer.push(2);
    expect(buffer.toArray()).toEqual([1, 2]);
    expect(buffer.oldest()).toBe(1);

    buffer.push(3);
    buffer.push(4);
    expect(buffer.toArray()).toEqual([2, 3, 4]);
    expect(buffer.oldest()).toBe(2);
    expect(buffer.length).toBe(3);
    expect(buffer.isFull()).toBe(true);
  });

  it("should empty on clear", () => {
    const buffer = new RingBuffer(2);
    buffer.push(1);
    buffer.push(2);
    buffer.clear();
    expect(buffer.length).toBe(0);
    expect(buffer.oldest()).toBeUndefined();
    expect(buffer.push(7)).toBeUndefined();
    expect(buffer.toArray()).toEqual([7]);
  });
});

describe("RunningSum", () => {
  it("should keep the sum of the last window values", () => {
    const sum = new RunningSum(3);
    for (const value of [1, 2, 3, 4, 5]) {
      sum.push(value);
    }
    expect(sum.sum).toBe(12);
    expect(sum.mean()).toBe(4);
    expect(sum.count).toBe(3);
    expect(sum.isFull()).toBe(true);
  });

  it("should average a partial window over what it holds", () => {
    const sum = new RunningSum(5);
    sum.push(2);
    sum.push(4);
    expect(sum.mean()).toBe(3);
    expect(sum.isFull()).toBe(false);
  });

  it("should report NaN mean when empty", () => {
    expect(new RunningSum(3).mean()).toBeNaN();
  });
});

describe("RunningMoments", () => {
  it("should compute population variance over the window", () => {
    const moments = new RunningMoments(4);
    for (const value of [2, 4, 4, 4, 5, 5, 7, 9]) {
      moments.push(value);
    }
    // window [5, 5, 7, 9]
    expect(moments.mean()).toBe(6.5);
    expect(moments.variance()).toBe(2.75);
  });

  it("should never report a negative variance", () => {
    const moments = new RunningMoments(3);
    for (let i = 0; i < 50; i++) {
      moments.push(0.1 + 1e6);
    }
    expect(moments.variance()).toBeGreaterThanOrEqual(0);
  });
});

describe("MonotonicDeque", () => {
  const values = [1, 3, 2, 5, 4, 1, 0];

  it("should track the sliding maximum", () => {
    const deque = new MonotonicDeque("max", 3);
    const peeks = values.map((value) => {
      deque.push(value);
      return deque.peek();
    });
    expect(peeks).toEqual([1, 3, 3, 5, 5, 5, 4]);
  });

  it("should track the sliding minimum", () => {
    const deque = new MonotonicDeque("min", 3);
    const peeks = values.map((value) => {
      deque.push(value);
      return deque.peek();
    });
    expect(peeks).toEqual([1, 1, 1, 2, 2, 1, 0]);
  });

  it("should agree with a naive scan over a long series", () => {
    const random = seededRandom(7);
    const series = Array.from({ length: 500 }, () => Math.round(random() * 100));
    const max = new MonotonicDeque("max", 7);
    const min = new MonotonicDeque("min", 7);

    series.forEach((value, i) => {
      max.push(value);
      min.push(value);
      const window = series.slice(Math.max(0, i - 6), i + 1);
      expect(max.peek()).toBe(Math.max(...window));
      expect(min.peek()).toBe(Math.min(...window));
    });
    expect(max.seen).toBe(500);
  });

  it("should report NaN when empty", () => {
    const deque = new MonotonicDeque("max", 2);
    expect(deque.peek()).toBeNaN();
    deque.push(4);
    deque.clear();
    expect(deque.peek()).toBeNaN();
    expect(deque.seen).toBe(0);
  });
});

describe("WilderSmoother", () => {
  it("should seed with the mean of the first period samples", () => {
    const smoother = new WilderSmoother(3);
    expect(smoother.next(1)).toBeUndefined();
    expect(smoother.next(2)).toBeUndefined();
    expect(smoother.next(3)).toBe(2);
    expect(smoother.next(6)).toBeCloseTo(10 / 3, 12);
  });

  it("should seed with the sum in sum mode", () => {
    const smoother = new WilderSmoother(2, "sum");
    expect(smoother.next(1)).toBeUndefined();
    expect(smoother.next(3)).toBe(4);
    expect(smoother.next(2)).toBe(4);
  });

  it("should forget everything on reset", () => {
    const smoother = new WilderSmoother(1);
    expect(smoother.next(5)).toBe(5);
    smoother.reset();
    expect(smoother.value).toBeUndefined();
    expect(smoother.next(7)).toBe(7);
  });
});

describe("Series helpers", () => {
  it("should compute typical and median price", () => {
    expect(typicalPrice({ high: 12, low: 9, close: 12 })).toBe(11);
    expect(medianPrice({ high: 12, low: 8 })).toBe(10);
  });

  it("should include gaps from the previous close in true range", () => {
    const bar = { high: 10, low: 8, close: 9 };
    expect(trueRange(bar)).toBe(2);
    expect(trueRange(bar, 12)).toBe(4);
    expect(trueRange(bar, 9)).toBe(2);
  });

  it("should reject mismatched parallel arrays", () => {
    expect(() => hlcBars("ATR", { high: [1, 2], low: [1], close: [1, 2] })).toThrow(
      "[ATR] high, low, and close must have the same length"
    );
    expect(() => candlesFromArrays([1], [1], [1], [1], [1], [])).toThrow(InvalidParameterError);
  });

  it("should zip six arrays into candles", () => {
    const candles = candlesFromArrays([1, 2], [10, 11], [12, 13], [9, 10], [11, 12], [100, 200]);
    expect(candles[1]).toEqual({ timestamp: 2, open: 11, high: 13, low: 10, close: 12, volume: 200 });
  });
});
