/**
 * SMA (Simple Moving Average) Indicator
 *
 * Equal-weighted average of the last n values.
 * The most basic trend indicator.
 *
 * Formula:
 *   SMA = (P1 + P2 + ... + Pn) / n
 *
 * Common periods:
 *   - 20: Short-term trend
 *   - 50: Medium-term trend
 *   - 200: Long-term trend (institutional benchmark)
 *
 * Interpretation:
 *   - Price above SMA: Bullish
 *   - Price below SMA: Bearish
 *   - SMA crossovers: Golden cross (bullish), Death cross (bearish)
 *
 * @see https://www.investopedia.com/terms/s/sma.asp
 */

import { z } from "zod";
import { IndicatorStream } from "../core/stream";
import { RunningSum } from "../core/runningSum";
import { parseParams, periodSchema } from "../schemas";
import type { IndicatorCalculator } from "../types";

export const SMAParamsSchema = z.object({ period: periodSchema() });
export type SMAParams = z.infer<typeof SMAParamsSchema>;

/**
 * Common SMA periods.
 */
export const SMA_PERIODS = {
  SHORT: 20,
  MEDIUM: 50,
  LONG: 200,
} as const;

/**
 * Default SMA parameters.
 */
export const SMA_DEFAULTS: SMAParams = {
  period: SMA_PERIODS.SHORT,
};

/**
 * Calculate SMA for a series of values.
 *
 * Uses a sliding window sum. Positions before `period - 1` are NaN.
 *
 * @param values - Input series (oldest first)
 * @param params - SMA parameters
 * @returns SMA series, same length as the input
 */
export function calculateSMA(values: readonly number[], params: SMAParams = SMA_DEFAULTS): number[] {
  const { period } = parseParams("SMA", SMAParamsSchema, params);
  const result = new Array<number>(values.length).fill(Number.NaN);

  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    // Add newest, then remove the value leaving the window
    sum += values[i];
    if (i >= period) {
      sum -= values[i - period];
    }
    if (i >= period - 1) {
      result[i] = sum / period;
    }
  }

  return result;
}

/**
 * SMA over the tail of a series that starts being valid at `start`.
 *
 * Positions before `start + period - 1` are NaN. Used where one indicator
 * smooths another's output (stochastic %K and %D).
 */
export function calculateSMAFrom(values: readonly number[], start: number, period: number): number[] {
  const result = new Array<number>(values.length).fill(Number.NaN);
  if (start >= values.length) {
    return result;
  }
  const smoothed = calculateSMA(values.slice(start), { period });
  for (let j = 0; j < smoothed.length; j++) {
    result[start + j] = smoothed[j];
  }
  return result;
}

/**
 * Streaming SMA backed by a ring buffer and running sum.
 */
export class SMAStream extends IndicatorStream<readonly number[], number, number> {
  readonly period: number;
  private readonly window: RunningSum;

  constructor(params: SMAParams = SMA_DEFAULTS) {
    super("SMA");
    this.period = parseParams("SMA", SMAParamsSchema, params).period;
    this.window = new RunningSum(this.period);
  }

  protected update(value: number): number | undefined {
    this.window.push(value);
    return this.window.isFull() ? this.window.sum / this.period : undefined;
  }

  protected clear(): void {
    this.window.clear();
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

/**
 * Get the minimum number of values required for the first SMA.
 */
export function smaRequiredPeriods(params: SMAParams = SMA_DEFAULTS): number {
  return params.period;
}

/**
 * Calculate multiple SMAs at once (e.g., 20, 50, 200).
 */
export function calculateMultipleSMAs(values: readonly number[], periods: readonly number[]): Map<number, number[]> {
  const results = new Map<number, number[]>();

  for (const period of periods) {
    results.set(period, calculateSMA(values, { period }));
  }

  return results;
}

/**
 * Check for golden cross (short SMA crosses above long SMA).
 */
export function isGoldenCross(prevShort: number, prevLong: number, currShort: number, currLong: number): boolean {
  return prevShort <= prevLong && currShort > currLong;
}

/**
 * Check for death cross (short SMA crosses below long SMA).
 */
export function isDeathCross(prevShort: number, prevLong: number, currShort: number, currLong: number): boolean {
  return prevShort >= prevLong && currShort < currLong;
}

/**
 * SMA calculator implementation.
 */
export const smaCalculator: IndicatorCalculator<SMAParams, readonly number[], number, number> = {
  name: "SMA",
  calculate: calculateSMA,
  requiredPeriods: smaRequiredPeriods,
  stream: (params) => new SMAStream(params),
};

export default smaCalculator;
