/**
 * Volatility Indicator Tests
 *
 * Bollinger Bands, ATR and linear regression channel.
 */

import { describe, expect, it } from "vitest";
import { closes, toHlcSeries } from "../src/core/series";
import { InvalidParameterError } from "../src/errors";
import { ATRStream, atrRequiredPeriods, calculateATR, calculateATRStop } from "../src/volatility/atr";
import {
  BollingerBandsStream,
  calculateBollingerBands,
  getBollingerSignal,
  isBollingerSqueeze,
  isTouchingLowerBand,
  isTouchingUpperBand,
} from "../src/volatility/bollinger";
import {
  calculateLinearRegression,
  LinearRegressionStream,
  regressWindow,
} from "../src/volatility/linearRegression";
import { generateCandles } from "./test-utils";

describe("Bollinger Bands", () => {
  it("should collapse on a constant series", () => {
    const result = calculateBollingerBands([10, 10, 10, 10, 10], { period: 3, stdDev: 2 });
    expect(result[1].middle).toBeNaN();
    for (let i = 2; i < 5; i++) {
      expect(result[i]).toEqual({ upper: 10, middle: 10, lower: 10, percentB: 0.5, bandwidth: 0 });
    }
  });

  it("should use the population standard deviation", () => {
    const [, , bands] = calculateBollingerBands([1, 2, 3], { period: 3, stdDev: 2 });
    const sigma = Math.sqrt(2 / 3);
    expect(bands.middle).toBe(2);
    expect(bands.upper).toBeCloseTo(2 + 2 * sigma, 10);
    expect(bands.lower).toBeCloseTo(2 - 2 * sigma, 10);
    expect(bands.percentB).toBeCloseTo((1 + 2 * sigma) / (4 * sigma), 10);
    expect(bands.bandwidth).toBeCloseTo(2 * sigma, 10);
  });

  it("should report zero bandwidth when the middle band is zero", () => {
    const [, bands] = calculateBollingerBands([-1, 1], { period: 2, stdDev: 1 });
    expect(bands.middle).toBe(0);
    expect(bands.bandwidth).toBe(0);
    expect(bands.upper).toBe(1);
  });

  it("should keep %B between 0 and 1 while price is inside the bands", () => {
    const values = closes(generateCandles(200));
    const result = calculateBollingerBands(values);
    result.forEach((bands, i) => {
      if (!Number.isNaN(bands.percentB) && values[i] >= bands.lower && values[i] <= bands.upper) {
        expect(bands.percentB).toBeGreaterThanOrEqual(0);
        expect(bands.percentB).toBeLessThanOrEqual(1);
      }
    });
  });

  it("should stream the batch values", () => {
    const values = closes(generateCandles(100));
    expect(new BollingerBandsStream().init(values)).toEqual(calculateBollingerBands(values));
  });

  it("should reject a non-positive multiplier", () => {
    expect(() => calculateBollingerBands([1], { period: 2, stdDev: 0 })).toThrow(
      "[BollingerBands] stdDev: must be a positive finite number"
    );
    expect(() => new BollingerBandsStream({ period: 2, stdDev: Number.POSITIVE_INFINITY })).toThrow(
      InvalidParameterError
    );
  });

  it("should classify band touches and squeezes", () => {
    expect(isTouchingUpperBand(105, 105)).toBe(true);
    expect(isTouchingUpperBand(104, 105, 0.5)).toBe(false);
    expect(isTouchingLowerBand(95, 96)).toBe(true);
    expect(isBollingerSqueeze(0.03)).toBe(true);
    expect(isBollingerSqueeze(0.05)).toBe(false);
    expect(getBollingerSignal(1.2)).toBe("overbought");
    expect(getBollingerSignal(-0.1)).toBe("oversold");
    expect(getBollingerSignal(0.5)).toBe("neutral");
  });
});

describe("ATR (Average True Range)", () => {
  const series = { high: [10, 12, 11], low: [8, 9, 10], close: [9, 11, 10] };

  it("should seed with the mean true range then apply Wilder smoothing", () => {
    expect(calculateATR(series, { period: 2 })).toEqual([Number.NaN, 2.5, 1.75]);
  });

  it("should stream the batch values", () => {
    const input = toHlcSeries(generateCandles(100));
    expect(new ATRStream().init(input)).toEqual(calculateATR(input));
    expect(atrRequiredPeriods()).toBe(14);
  });

  it("should scale stop distance by the multiplier", () => {
    expect(calculateATRStop(1.5)).toBe(3);
    expect(calculateATRStop(1.5, 3)).toBe(4.5);
  });

  it("should reject a zero period", () => {
    expect(() => calculateATR(series, { period: 0 })).toThrow("[ATR] period: must be greater than 0");
  });
});

describe("Linear Regression", () => {
  it("should fit a perfectly linear window", () => {
    expect(regressWindow([1, 2, 3, 4, 5], 2)).toEqual({
      value: 5,
      upper: 5,
      lower: 5,
      slope: 1,
      r: 1,
      rSquared: 1,
    });
  });

  it("should report zero correlation on a flat window", () => {
    const fit = regressWindow([4, 4, 4], 2);
    expect(fit.value).toBe(4);
    expect(fit.slope).toBe(0);
    expect(fit.r).toBe(0);
    expect(fit.rSquared).toBe(0);
  });

  it("should keep r within -1 and 1", () => {
    for (const fit of calculateLinearRegression(closes(generateCandles(150)), { period: 10, multiplier: 2 })) {
      if (!Number.isNaN(fit.r)) {
        expect(Math.abs(fit.r)).toBeLessThanOrEqual(1);
        expect(fit.rSquared).toBeGreaterThanOrEqual(0);
        expect(fit.rSquared).toBeLessThanOrEqual(1);
        expect(fit.upper).toBeGreaterThanOrEqual(fit.lower);
      }
    }
  });

  it("should stream the batch values", () => {
    const values = closes(generateCandles(80));
    const params = { period: 12, multiplier: 1.5 };
    expect(new LinearRegressionStream(params).init(values)).toEqual(calculateLinearRegression(values, params));
  });

  it("should reject a period below 2 and a negative multiplier", () => {
    expect(() => calculateLinearRegression([1, 2], { period: 1, multiplier: 2 })).toThrow(
      "[LinearRegression] period: must be at least 2 for regression"
    );
    expect(() => new LinearRegressionStream({ period: 5, multiplier: -1 })).toThrow("multiplier: must be non-negative");
  });
});
