/**
 * Volume Indicator Tests
 *
 * VWAP variants, cumulative volume delta and fixed-range volume profile.
 */

import { describe, expect, it } from "vitest";
import { toHlcvSeries } from "../src/core/series";
import { InsufficientDataError, InvalidParameterError, NotInitializedError } from "../src/errors";
import type { Candle } from "../src/types";
import { BarCVDStream, calculateCVD, calculateCVDFromBars, CVDStream, volumeDelta } from "../src/volume/cvd";
import { calculateFRVP, FRVPStream } from "../src/volume/frvp";
import {
  AnchoredVWAPStream,
  calculateAnchoredVWAP,
  calculateAnchoredVWAPFromTimestamp,
  calculateRollingVWAP,
  calculateSessionVWAP,
  MS_PER_DAY,
  RollingVWAPStream,
  SessionVWAPStream,
  utcDay,
} from "../src/volume/vwap";
import { flatCandle, generateCandles } from "./test-utils";

const DAY_START = Date.UTC(2024, 2, 4);
const HOUR_MS = 3_600_000;

function bar(timestamp: number, high: number, low: number, close: number, volume: number): Candle {
  return { timestamp, open: close, high, low, close, volume };
}

describe("Session VWAP", () => {
  const candles = [
    flatCandle(DAY_START, 100, 100),
    flatCandle(DAY_START + HOUR_MS, 110, 300),
    flatCandle(DAY_START + MS_PER_DAY, 200, 50),
    flatCandle(DAY_START + MS_PER_DAY + HOUR_MS, 220, 50),
  ];

  it("should accumulate within a UTC day and restart on the next", () => {
    expect(calculateSessionVWAP(candles)).toEqual([100, 107.5, 200, 210]);
  });

  it("should report NaN until volume accumulates", () => {
    const result = calculateSessionVWAP([flatCandle(DAY_START, 100, 0), flatCandle(DAY_START + HOUR_MS, 104, 10)]);
    expect(result[0]).toBeNaN();
    expect(result[1]).toBe(104);
  });

  it("should expose cumulative volume that only grows within a session", () => {
    const stream = new SessionVWAPStream();
    const volumes = candles.slice(0, 2).map((candle) => {
      stream.next(candle);
      return stream.cumulativeVolume();
    });
    expect(volumes).toEqual([100, 400]);
    expect(stream.cumulativeTpVolume()).toBe(43_000);
    stream.next(candles[2]);
    expect(stream.cumulativeVolume()).toBe(50);
  });

  it("should stream the batch values", () => {
    const history = generateCandles(72);
    expect(new SessionVWAPStream().init(history)).toEqual(calculateSessionVWAP(history));
  });

  it("should number days from the epoch", () => {
    expect(utcDay(0)).toBe(0);
    expect(utcDay(MS_PER_DAY - 1)).toBe(0);
    expect(utcDay(MS_PER_DAY)).toBe(1);
    expect(utcDay(-1)).toBe(-1);
  });
});

describe("Rolling VWAP", () => {
  const candles = [flatCandle(0, 10, 1), flatCandle(1, 20, 1), flatCandle(2, 30, 2), flatCandle(3, 40, 0)];

  it("should weight the last period candles by volume", () => {
    const result = calculateRollingVWAP(candles, { period: 2 });
    expect(result[0]).toBeNaN();
    expect(result[1]).toBe(15);
    expect(result[2]).toBeCloseTo(80 / 3, 10);
    expect(result[3]).toBe(30);
  });

  it("should report NaN for a window without volume", () => {
    const result = calculateRollingVWAP([flatCandle(0, 10, 0), flatCandle(1, 20, 0)], { period: 2 });
    expect(result[1]).toBeNaN();
  });

  it("should stream the batch values", () => {
    const history = generateCandles(60);
    expect(new RollingVWAPStream({ period: 5 }).init(history)).toEqual(calculateRollingVWAP(history, { period: 5 }));
  });
});

describe("Anchored VWAP", () => {
  const candles = [
    flatCandle(DAY_START, 100, 100),
    flatCandle(DAY_START + HOUR_MS, 110, 100),
    flatCandle(DAY_START + 2 * HOUR_MS, 120, 100),
  ];

  it("should accumulate from the anchor index", () => {
    expect(calculateAnchoredVWAP(candles, 1)).toEqual([Number.NaN, 110, 115]);
  });

  it("should reject an anchor index that is not a non-negative integer", () => {
    expect(() => calculateAnchoredVWAP(candles, 1.5)).toThrow(InvalidParameterError);
    expect(() => calculateAnchoredVWAP(candles, 1.5)).toThrow("anchorIndex: must be an integer");
    expect(() => calculateAnchoredVWAP(candles, -1)).toThrow(InvalidParameterError);
    expect(() => calculateAnchoredVWAP(candles, -1)).toThrow("anchorIndex: must be at least 0");
  });

  it("should anchor on the first candle at or after a timestamp", () => {
    expect(calculateAnchoredVWAPFromTimestamp(candles, DAY_START + 30 * 60_000)).toEqual([Number.NaN, 110, 115]);
    expect(calculateAnchoredVWAPFromTimestamp(candles, DAY_START + 3 * HOUR_MS)).toBeUndefined();
  });

  it("should keep its anchor across init", () => {
    const stream = new AnchoredVWAPStream({ anchorTimestamp: DAY_START + HOUR_MS });
    expect(stream.init(candles)).toEqual([Number.NaN, 110, 115]);
    expect(stream.init(candles)).toEqual([Number.NaN, 110, 115]);
    expect(stream.anchorTimestamp()).toBe(DAY_START + HOUR_MS);
    expect(stream.cumulativeVolume()).toBe(200);
  });

  it("should anchor on the next candle after anchorNow", () => {
    const stream = new AnchoredVWAPStream();
    stream.next(candles[0]);
    stream.next(candles[1]);
    stream.anchorNow();
    expect(stream.isReady()).toBe(false);
    expect(stream.next(candles[2])).toBe(120);
    expect(stream.anchorTimestamp()).toBe(DAY_START + 2 * HOUR_MS);
  });

  it("should restart accumulation when the anchor moves", () => {
    const stream = new AnchoredVWAPStream();
    stream.init(candles);
    stream.setAnchor(DAY_START + 5 * HOUR_MS);
    expect(stream.next(flatCandle(DAY_START + 4 * HOUR_MS, 90))).toBeUndefined();
    expect(stream.next(flatCandle(DAY_START + 5 * HOUR_MS, 95))).toBe(95);
  });

  it("should drop the anchor on reset", () => {
    const stream = new AnchoredVWAPStream({ anchorTimestamp: DAY_START + 2 * HOUR_MS });
    stream.reset();
    expect(stream.anchorTimestamp()).toBeUndefined();
    expect(stream.next(candles[0])).toBe(100);
  });
});

describe("CVD (Cumulative Volume Delta)", () => {
  it("should be the prefix sum of deltas", () => {
    expect(calculateCVD([100, -50, 75, -25, 150])).toEqual([100, 50, 125, 100, 250]);
  });

  it("should pass NaN deltas through without touching the total", () => {
    expect(calculateCVD([10, Number.NaN, 5])).toEqual([10, Number.NaN, 15]);
    const stream = new CVDStream();
    expect(stream.init([10, Number.NaN, 5])).toEqual([10, Number.NaN, 15]);
    expect(stream.total()).toBe(15);
  });

  it("should estimate bar delta from the close location", () => {
    expect(volumeDelta({ high: 110, low: 100, close: 109, volume: 1000 })).toBe(800);
    expect(volumeDelta({ high: 110, low: 100, close: 105, volume: 1000 })).toBe(0);
    expect(volumeDelta({ high: 100, low: 100, close: 100, volume: 1000 })).toBe(0);
  });

  it("should accumulate bar deltas", () => {
    const series = { high: [110, 110], low: [100, 100], close: [109, 100], volume: [1000, 500] };
    expect(calculateCVDFromBars(series)).toEqual([800, 300]);
    expect(new BarCVDStream().init(series)).toEqual([800, 300]);
  });

  it("should stream the batch values", () => {
    const series = toHlcvSeries(generateCandles(50));
    expect(new BarCVDStream().init(series)).toEqual(calculateCVDFromBars(series));
  });
});

describe("FRVP (Fixed Range Volume Profile)", () => {
  it("should spread a single bar evenly across its bins", () => {
    const profile = calculateFRVP([bar(DAY_START, 110, 100, 105, 1000)], { bins: 10, valueAreaPercent: 0.7 });
    expect(profile.histogram).toHaveLength(10);
    for (const row of profile.histogram) {
      expect(row.volume).toBeCloseTo(100, 9);
    }
    expect(profile.totalVolume).toBeCloseTo(1000, 9);
    expect(profile.rangeLow).toBe(100);
    expect(profile.rangeHigh).toBe(110);
    expect(profile.poc).toBe(100.5);
    expect(profile.val).toBe(100);
    expect(profile.vah).toBe(107);
    expect(profile.histogram[3]).toEqual({ price: 103.5, volume: 100, low: 103, high: 104 });
  });

  it("should grow the value area downward on ties", () => {
    const candles = [bar(0, 1, 0, 0.5, 10), bar(1, 2, 1, 1.5, 20), bar(2, 3, 2, 2.5, 10)];
    const profile = calculateFRVP(candles, { bins: 3, valueAreaPercent: 0.7 });
    expect(profile.histogram.map((row) => row.volume)).toEqual([10, 20, 10]);
    expect(profile.poc).toBe(1.5);
    expect(profile.pocVolume).toBe(20);
    expect(profile.val).toBe(0);
    expect(profile.vah).toBe(2);
    expect(profile.valueAreaVolume).toBe(30);
  });

  it("should collapse a flat range into one row", () => {
    const profile = calculateFRVP([flatCandle(0, 50, 10), flatCandle(1, 50, 30)], { bins: 5, valueAreaPercent: 0.7 });
    expect(profile.poc).toBe(50);
    expect(profile.vah).toBe(50);
    expect(profile.val).toBe(50);
    expect(profile.totalVolume).toBe(40);
    expect(profile.histogram).toEqual([{ price: 50, volume: 40, low: 50, high: 50 }]);
  });

  it("should put a zero-range bar entirely in its bin", () => {
    const candles = [bar(0, 10, 0, 5, 0), flatCandle(1, 7.5, 40)];
    const profile = calculateFRVP(candles, { bins: 4, valueAreaPercent: 0.7 });
    expect(profile.histogram.map((row) => row.volume)).toEqual([0, 0, 0, 40]);
    expect(profile.poc).toBe(8.75);
  });

  it("should reject empty input and invalid parameters", () => {
    expect(() => calculateFRVP([])).toThrow(InsufficientDataError);
    expect(() => calculateFRVP([])).toThrow("[FRVP] Insufficient data: need 1, got 0");
    expect(() => calculateFRVP([flatCandle(0, 1)], { bins: 0, valueAreaPercent: 0.7 })).toThrow(
      "[FRVP] bins: must be at least 1"
    );
    expect(() => new FRVPStream({ bins: 10, valueAreaPercent: 1.5 })).toThrow(
      "valueAreaPercent: must be between 0 and 1"
    );
  });

  it("should recompute the profile on every streamed candle", () => {
    const stream = new FRVPStream({ bins: 10, valueAreaPercent: 0.7 });
    expect(stream.init([])).toEqual([]);
    expect(stream.isReady()).toBe(false);
    expect(() => stream.current()).toThrow(NotInitializedError);

    const history = generateCandles(30);
    history.forEach((candle) => stream.next(candle));
    expect(stream.candleCount()).toBe(30);
    expect(stream.current()).toEqual(calculateFRVP(history, { bins: 10, valueAreaPercent: 0.7 }));

    stream.reset();
    expect(stream.candleCount()).toBe(0);
    expect(stream.init(history.slice(0, 5))).toEqual([calculateFRVP(history.slice(0, 5), { bins: 10, valueAreaPercent: 0.7 })]);
  });
});
