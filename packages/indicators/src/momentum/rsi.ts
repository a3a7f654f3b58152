/**
 * RSI (Relative Strength Index) Indicator
 *
 * Developed by J. Welles Wilder (1978)
 * Measures momentum by comparing magnitude of recent gains to recent losses.
 *
 * Formula:
 *   RSI = 100 - (100 / (1 + RS))
 *   RS = Average Gain / Average Loss
 *
 * Averages are seeded with the mean of the first `period` changes, then
 * Wilder-smoothed (α = 1/period). The first RSI sits at index `period`.
 *
 * Interpretation:
 *   - > 70: Overbought (potential reversal down)
 *   - < 30: Oversold (potential reversal up)
 *   - 50: Neutral
 *
 * @see https://www.investopedia.com/terms/r/rsi.asp
 */

import { z } from "zod";
import { IndicatorStream } from "../core/stream";
import { WilderSmoother } from "../core/wilder";
import { parseParams, periodSchema } from "../schemas";
import type { IndicatorCalculator } from "../types";

export const RSIParamsSchema = z.object({ period: periodSchema() });
export type RSIParams = z.infer<typeof RSIParamsSchema>;

/**
 * Default RSI parameters.
 */
export const RSI_DEFAULTS: RSIParams = {
  period: 14,
};

/**
 * RSI overbought/oversold thresholds.
 */
export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;

/**
 * RSI from smoothed averages.
 *
 * No movement at all reads 50; no losses reads 100; no gains reads 0.
 */
export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return avgGain === 0 ? 50 : 100;
  }
  if (avgGain === 0) {
    return 0;
  }
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * Calculate RSI for a series of values.
 *
 * @param values - Input series (oldest first)
 * @param params - RSI parameters
 * @returns RSI series (0-100), NaN before index `period`
 */
export function calculateRSI(values: readonly number[], params: RSIParams = RSI_DEFAULTS): number[] {
  const { period } = parseParams("RSI", RSIParamsSchema, params);
  const result = new Array<number>(values.length).fill(Number.NaN);

  if (values.length <= period) {
    return result;
  }

  const alpha = 1 / period;
  let avgGain = 0;
  let avgLoss = 0;

  // Seed with the mean of the first `period` changes
  for (let i = 1; i <= period; i++) {
    const change = values[i] - values[i - 1];
    if (change > 0) {
      avgGain += change;
    } else {
      avgLoss -= change;
    }
  }
  avgGain /= period;
  avgLoss /= period;
  result[period] = rsiFromAverages(avgGain, avgLoss);

  for (let i = period + 1; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change > 0 ? 0 : -change;
    avgGain = avgGain * (1 - alpha) + gain * alpha;
    avgLoss = avgLoss * (1 - alpha) + loss * alpha;
    result[i] = rsiFromAverages(avgGain, avgLoss);
  }

  return result;
}

/**
 * Streaming RSI: two Wilder smoothers over gains and losses.
 */
export class RSIStream extends IndicatorStream<readonly number[], number, number> {
  readonly period: number;
  private readonly gains: WilderSmoother;
  private readonly losses: WilderSmoother;
  private previous: number | undefined;

  constructor(params: RSIParams = RSI_DEFAULTS) {
    super("RSI");
    this.period = parseParams("RSI", RSIParamsSchema, params).period;
    this.gains = new WilderSmoother(this.period);
    this.losses = new WilderSmoother(this.period);
  }

  protected update(value: number): number | undefined {
    const previous = this.previous;
    this.previous = value;
    if (previous === undefined) {
      return undefined;
    }

    const change = value - previous;
    const avgGain = this.gains.next(change > 0 ? change : 0);
    const avgLoss = this.losses.next(change > 0 ? 0 : -change);
    if (avgGain === undefined || avgLoss === undefined) {
      return undefined;
    }
    return rsiFromAverages(avgGain, avgLoss);
  }

  protected clear(): void {
    this.gains.reset();
    this.losses.reset();
    this.previous = undefined;
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

/**
 * Get the minimum number of values required for RSI calculation.
 */
export function rsiRequiredPeriods(params: RSIParams = RSI_DEFAULTS): number {
  return params.period + 1; // Need period + 1 for first RSI value
}

/**
 * Check if RSI indicates overbought condition.
 */
export function isOverbought(rsi: number, threshold = RSI_OVERBOUGHT): boolean {
  return rsi >= threshold;
}

/**
 * Check if RSI indicates oversold condition.
 */
export function isOversold(rsi: number, threshold = RSI_OVERSOLD): boolean {
  return rsi <= threshold;
}

/**
 * RSI calculator implementation.
 */
export const rsiCalculator: IndicatorCalculator<RSIParams, readonly number[], number, number> = {
  name: "RSI",
  calculate: calculateRSI,
  requiredPeriods: rsiRequiredPeriods,
  stream: (params) => new RSIStream(params),
};

export default rsiCalculator;
