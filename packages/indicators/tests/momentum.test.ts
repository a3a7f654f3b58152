/**
 * Momentum Indicator Tests
 *
 * RSI, Stochastic, Stochastic RSI, MFI and ADX.
 */

import { beforeAll, describe, expect, it } from "vitest";
import { closes, toHlcSeries, toHlcvSeries } from "../src/core/series";
import { adxRequiredPeriods, ADXStream, calculateADX, directionalMove, isTrending } from "../src/momentum/adx";
import { calculateMFI, mfiFromFlows, MFIStream, mfiRequiredPeriods } from "../src/momentum/mfi";
import {
  calculateRSI,
  isOverbought,
  isOversold,
  RSI_DEFAULTS,
  rsiFromAverages,
  RSIStream,
  rsiRequiredPeriods,
} from "../src/momentum/rsi";
import { calculateStochRSI, StochRSIStream, stochRsiRequiredPeriods } from "../src/momentum/stochRsi";
import {
  calculateStochastic,
  isBearishCrossover,
  isBullishCrossover,
  isStochasticOverbought,
  isStochasticOversold,
  stochasticPosition,
  StochasticStream,
  stochasticRequiredPeriods,
} from "../src/momentum/stochastic";
import type { Candle } from "../src/types";
import { generateCandles, generateDowntrend, generateUptrend } from "./test-utils";

const EPSILON = 1e-9;

describe("RSI (Relative Strength Index)", () => {
  let candles: Candle[];

  beforeAll(() => {
    candles = generateCandles(200);
  });

  it("should read 100 on a strictly rising series", () => {
    const result = calculateRSI([1, 2, 3, 4, 5], { period: 3 });
    expect(result.slice(0, 3)).toEqual([Number.NaN, Number.NaN, Number.NaN]);
    expect(result[3]).toBe(100);
    expect(result[4]).toBe(100);
    expect(calculateRSI([1, 2, 3, 4, 5], { period: 2 }).slice(2)).toEqual([100, 100, 100]);
  });

  it("should read 0 on a strictly falling series", () => {
    const result = calculateRSI([5, 4, 3, 2, 1], { period: 3 });
    expect(result[3]).toBe(0);
    expect(result[4]).toBe(0);
  });

  it("should read 50 on a flat series", () => {
    expect(calculateRSI([7, 7, 7, 7], { period: 2 })[3]).toBe(50);
  });

  it("should return values between 0 and 100", () => {
    for (const value of calculateRSI(closes(candles))) {
      if (!Number.isNaN(value)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(100);
      }
    }
  });

  it("should first report at index period", () => {
    const result = calculateRSI(closes(candles), { period: 14 });
    expect(result[13]).toBeNaN();
    expect(Number.isFinite(result[14])).toBe(true);
  });

  it("should map smoothed averages to RSI", () => {
    expect(rsiFromAverages(1, 1)).toBe(50);
    expect(rsiFromAverages(3, 1)).toBe(75);
    expect(rsiFromAverages(0, 0)).toBe(50);
  });

  it("should stream the batch values", () => {
    const values = closes(candles);
    const stream = new RSIStream({ period: 14 });
    expect(stream.init(values)).toEqual(calculateRSI(values, { period: 14 }));
    expect(stream.current()).toBe(calculateRSI(values, { period: 14 })[values.length - 1]);
  });

  it("should return period + 1 required periods", () => {
    expect(rsiRequiredPeriods({ period: 14 })).toBe(15);
    expect(rsiRequiredPeriods()).toBe(RSI_DEFAULTS.period + 1);
  });

  it("should detect overbought and oversold", () => {
    expect(isOverbought(75)).toBe(true);
    expect(isOverbought(65)).toBe(false);
    expect(isOversold(25)).toBe(true);
    expect(isOversold(35)).toBe(false);
  });
});

describe("Stochastic Oscillator", () => {
  const series = {
    high: [10, 11, 12, 13],
    low: [8, 9, 10, 11],
    close: [9, 10, 12, 11],
  };

  it("should compute fast %K and %D", () => {
    const result = calculateStochastic(series, { kPeriod: 3, dPeriod: 2, slow: false });
    expect(result[1]).toEqual({ k: Number.NaN, d: Number.NaN });
    expect(result[2]).toEqual({ k: 100, d: Number.NaN });
    expect(result[3]).toEqual({ k: 50, d: 75 });
  });

  it("should smooth %K in slow mode", () => {
    const result = calculateStochastic(series, { kPeriod: 3, dPeriod: 1, slowing: 2, slow: true });
    expect(result[2].k).toBeNaN();
    expect(result[3]).toEqual({ k: 75, d: 75 });
  });

  it("should read 50 when the window has no range", () => {
    expect(stochasticPosition(10, 10, 10)).toBe(50);
  });

  it("should stay within 0 to 100", () => {
    const result = calculateStochastic(toHlcSeries(generateCandles(200)));
    for (const { k, d } of result) {
      for (const value of [k, d]) {
        if (!Number.isNaN(value)) {
          expect(value).toBeGreaterThanOrEqual(-EPSILON);
          expect(value).toBeLessThanOrEqual(100 + EPSILON);
        }
      }
    }
  });

  it("should stream the batch values", () => {
    const input = toHlcSeries(generateCandles(120));
    expect(new StochasticStream().init(input)).toEqual(calculateStochastic(input));
  });

  it("should report required periods", () => {
    expect(stochasticRequiredPeriods({ kPeriod: 14, dPeriod: 3 })).toBe(16);
    expect(stochasticRequiredPeriods({ kPeriod: 14, dPeriod: 3, slow: false })).toBe(14);
  });

  it("should detect crossovers and extremes", () => {
    expect(isBullishCrossover(20, 25, 30, 25)).toBe(true);
    expect(isBearishCrossover(30, 25, 20, 25)).toBe(true);
    expect(isStochasticOverbought(85)).toBe(true);
    expect(isStochasticOversold(15)).toBe(true);
  });

  it("should reject a zero period", () => {
    expect(() => calculateStochastic(series, { kPeriod: 0, dPeriod: 3 })).toThrow(
      "[Stochastic] kPeriod: must be greater than 0"
    );
  });
});

describe("Stochastic RSI", () => {
  const params = { rsiPeriod: 2, stochPeriod: 2, kSmooth: 2, dPeriod: 2 };

  it("should read 50 when RSI does not move", () => {
    const result = calculateStochRSI(new Array<number>(8).fill(5), params);
    expect(result[3].k).toBeNaN();
    expect(result[4]).toEqual({ k: 50, d: Number.NaN });
    expect(result[5]).toEqual({ k: 50, d: 50 });
  });

  it("should first report %K at rsiPeriod + stochPeriod + kSmooth - 2", () => {
    const values = closes(generateCandles(80));
    const result = calculateStochRSI(values);
    expect(result[28].k).toBeNaN();
    expect(Number.isFinite(result[29].k)).toBe(true);
    expect(stochRsiRequiredPeriods()).toBe(30);
  });

  it("should stream the batch values", () => {
    const values = closes(generateCandles(150));
    const batch = calculateStochRSI(values);
    const streamed = new StochRSIStream().init(values);
    streamed.forEach((value, i) => {
      for (const key of ["k", "d"] as const) {
        if (Number.isNaN(batch[i][key])) {
          expect(value[key]).toBeNaN();
        } else {
          expect(value[key]).toBeCloseTo(batch[i][key], 6);
          expect(value[key]).toBeGreaterThanOrEqual(-EPSILON);
          expect(value[key]).toBeLessThanOrEqual(100 + EPSILON);
        }
      }
    });
  });
});

describe("MFI (Money Flow Index)", () => {
  const series = {
    high: [10, 11, 10, 12],
    low: [8, 9, 8, 10],
    close: [9, 10, 9, 11],
    volume: [100, 100, 200, 100],
  };

  it("should compare positive and negative money flow", () => {
    const result = calculateMFI(series, { period: 2 });
    expect(result[1]).toBeNaN();
    expect(result[2]).toBeCloseTo(250 / 7, 10);
    expect(result[3]).toBeCloseTo(1100 / 29, 10);
  });

  it("should read 100 when there is no negative flow", () => {
    expect(mfiFromFlows(500, 0)).toBe(100);
    expect(mfiFromFlows(0, 500)).toBe(0);
  });

  it("should stream the batch values", () => {
    const stream = new MFIStream({ period: 2 });
    expect(stream.init(series)).toEqual(calculateMFI(series, { period: 2 }));
    expect(mfiRequiredPeriods({ period: 2 })).toBe(3);
  });

  it("should stay within 0 to 100", () => {
    for (const value of calculateMFI(toHlcvSeries(generateCandles(200)))) {
      if (!Number.isNaN(value)) {
        expect(value).toBeGreaterThanOrEqual(-EPSILON);
        expect(value).toBeLessThanOrEqual(100 + EPSILON);
      }
    }
  });

  it("should reject mismatched arrays", () => {
    expect(() => calculateMFI({ ...series, volume: [1] })).toThrow(
      "[MFI] high, low, close, and volume must have the same length"
    );
  });
});

describe("ADX (Average Directional Index)", () => {
  it("should classify directional movement", () => {
    const previous = { high: 10, low: 8, close: 9 };
    expect(directionalMove({ high: 12, low: 9, close: 11 }, previous)).toEqual({ plus: 2, minus: 0 });
    expect(directionalMove({ high: 10, low: 5, close: 6 }, previous)).toEqual({ plus: 0, minus: 3 });
    expect(directionalMove({ high: 11, low: 7, close: 9 }, previous)).toEqual({ plus: 0, minus: 0 });
  });

  it("should compute a single-period ADX exactly", () => {
    const result = calculateADX({ high: [10, 12], low: [8, 9], close: [9, 11] }, { period: 1 });
    expect(result[0]).toEqual({ adx: Number.NaN, plusDi: Number.NaN, minusDi: Number.NaN });
    expect(result[1].adx).toBe(100);
    expect(result[1].plusDi).toBeCloseTo(200 / 3, 10);
    expect(result[1].minusDi).toBe(0);
  });

  it("should report DI at index period and ADX at 2 × period - 1", () => {
    const result = calculateADX(toHlcSeries(generateCandles(100)), { period: 14 });
    expect(result[13].plusDi).toBeNaN();
    expect(Number.isFinite(result[14].plusDi)).toBe(true);
    expect(result[26].adx).toBeNaN();
    expect(Number.isFinite(result[27].adx)).toBe(true);
    expect(adxRequiredPeriods({ period: 14 })).toBe(28);
  });

  it("should favour +DI in an uptrend and -DI in a downtrend", () => {
    const up = calculateADX(toHlcSeries(generateUptrend(80)));
    const down = calculateADX(toHlcSeries(generateDowntrend(80)));
    const lastUp = up[up.length - 1];
    const lastDown = down[down.length - 1];
    expect(lastUp.plusDi).toBeGreaterThan(lastUp.minusDi);
    expect(lastDown.minusDi).toBeGreaterThan(lastDown.plusDi);
    expect(isTrending(lastUp.adx)).toBe(true);
  });

  it("should stay within 0 to 100", () => {
    for (const { adx, plusDi, minusDi } of calculateADX(toHlcSeries(generateCandles(200)))) {
      for (const value of [adx, plusDi, minusDi]) {
        if (!Number.isNaN(value)) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(100 + EPSILON);
        }
      }
    }
  });

  it("should stream the batch values", () => {
    const input = toHlcSeries(generateCandles(120));
    const batch = calculateADX(input);
    const streamed = new ADXStream().init(input);
    streamed.forEach((value, i) => {
      for (const key of ["adx", "plusDi", "minusDi"] as const) {
        if (Number.isNaN(batch[i][key])) {
          expect(value[key]).toBeNaN();
        } else {
          expect(Math.abs(value[key] - batch[i][key])).toBeLessThanOrEqual(1e-2);
        }
      }
    });
  });
});
