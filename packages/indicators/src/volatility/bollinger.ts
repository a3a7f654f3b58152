/**
 * Bollinger Bands Indicator
 *
 * Developed by John Bollinger (1980s)
 * Volatility bands placed above and below a moving average.
 *
 * Formula:
 *   Middle Band = SMA(period)
 *   Upper Band = Middle Band + (stdDev * σ)
 *   Lower Band = Middle Band - (stdDev * σ)
 *   σ = population standard deviation over period, via E[x²] - E[x]²
 *       floored at zero
 *
 * Additional metrics:
 *   %B = (Price - Lower) / (Upper - Lower), 0.5 when the bands collapse
 *   Bandwidth = (Upper - Lower) / Middle, 0 when Middle is 0
 *
 * Interpretation:
 *   - Price touching upper band: Potentially overbought
 *   - Price touching lower band: Potentially oversold
 *   - Narrowing bands: Low volatility (squeeze)
 *   - Expanding bands: High volatility (breakout potential)
 *
 * @see https://www.investopedia.com/terms/b/bollingerbands.asp
 */

import { z } from "zod";
import { RunningMoments } from "../core/runningSum";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import type { BollingerBandsResult, IndicatorCalculator } from "../types";

export const BollingerBandsParamsSchema = z.object({
  period: periodSchema(),
  stdDev: z
    .number()
    .positive("must be a positive finite number")
    .finite("must be a positive finite number"),
});
export type BollingerBandsParams = z.infer<typeof BollingerBandsParamsSchema>;

/**
 * Default Bollinger Bands parameters (John Bollinger's standard).
 */
export const BOLLINGER_DEFAULTS: BollingerBandsParams = {
  period: 20,
  stdDev: 2.0,
};

/**
 * Bands for one window given its mean and (floored) variance.
 */
export function bollingerBands(mean: number, variance: number, price: number, stdDev: number): BollingerBandsResult {
  const sigma = variance > 0 ? Math.sqrt(variance) : 0;
  const upper = mean + stdDev * sigma;
  const lower = mean - stdDev * sigma;
  const width = upper - lower;

  return {
    upper,
    middle: mean,
    lower,
    percentB: width > 0 ? (price - lower) / width : 0.5,
    bandwidth: mean !== 0 ? width / mean : 0,
  };
}

function emptyBands(): BollingerBandsResult {
  return {
    upper: Number.NaN,
    middle: Number.NaN,
    lower: Number.NaN,
    percentB: Number.NaN,
    bandwidth: Number.NaN,
  };
}

/**
 * Calculate Bollinger Bands for a series of values.
 *
 * @param values - Input series (oldest first)
 * @param params - Bollinger Bands parameters
 * @returns One record per input; NaN fields before index period - 1
 */
export function calculateBollingerBands(
  values: readonly number[],
  params: BollingerBandsParams = BOLLINGER_DEFAULTS
): BollingerBandsResult[] {
  const { period, stdDev } = parseParams("BollingerBands", BollingerBandsParamsSchema, params);
  const result = values.map(() => emptyBands());

  let sum = 0;
  let sumSquares = 0;
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    sum += value;
    sumSquares += value * value;
    if (i >= period) {
      const leaving = values[i - period];
      sum -= leaving;
      sumSquares -= leaving * leaving;
    }
    if (i >= period - 1) {
      const mean = sum / period;
      const variance = Math.max(0, sumSquares / period - mean * mean);
      result[i] = bollingerBands(mean, variance, value, stdDev);
    }
  }

  return result;
}

/**
 * Streaming Bollinger Bands over a running sum and sum of squares.
 */
export class BollingerBandsStream extends IndicatorStream<readonly number[], number, BollingerBandsResult> {
  readonly period: number;
  readonly stdDev: number;
  private readonly window: RunningMoments;

  constructor(params: BollingerBandsParams = BOLLINGER_DEFAULTS) {
    super("BollingerBands");
    const { period, stdDev } = parseParams("BollingerBands", BollingerBandsParamsSchema, params);
    this.period = period;
    this.stdDev = stdDev;
    this.window = new RunningMoments(period);
  }

  protected update(value: number): BollingerBandsResult | undefined {
    this.window.push(value);
    if (!this.window.isFull()) {
      return undefined;
    }
    return bollingerBands(this.window.mean(), this.window.variance(), value, this.stdDev);
  }

  protected clear(): void {
    this.window.clear();
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): BollingerBandsResult {
    return emptyBands();
  }
}

/**
 * Get the minimum number of values required for Bollinger Bands calculation.
 */
export function bollingerRequiredPeriods(params: BollingerBandsParams = BOLLINGER_DEFAULTS): number {
  return params.period;
}

/**
 * Check if price is touching or above upper band.
 */
export function isTouchingUpperBand(price: number, upperBand: number, tolerance = 0): boolean {
  return price >= upperBand - tolerance;
}

/**
 * Check if price is touching or below lower band.
 */
export function isTouchingLowerBand(price: number, lowerBand: number, tolerance = 0): boolean {
  return price <= lowerBand + tolerance;
}

/**
 * Check for Bollinger Band squeeze (low volatility).
 *
 * @param bandwidth - Current bandwidth as a fraction of the middle band
 * @param threshold - Bandwidth threshold for squeeze (default: 4%)
 */
export function isBollingerSqueeze(bandwidth: number, threshold = 0.04): boolean {
  return bandwidth < threshold;
}

/**
 * Get signal based on %B value.
 */
export function getBollingerSignal(percentB: number): "overbought" | "oversold" | "neutral" {
  if (percentB > 1) return "overbought";
  if (percentB < 0) return "oversold";
  return "neutral";
}

/**
 * Bollinger Bands Calculator implementation.
 */
export const bollingerCalculator: IndicatorCalculator<
  BollingerBandsParams,
  readonly number[],
  number,
  BollingerBandsResult
> = {
  name: "BollingerBands",
  calculate: calculateBollingerBands,
  requiredPeriods: bollingerRequiredPeriods,
  stream: (params) => new BollingerBandsStream(params),
};

export default bollingerCalculator;
