/**
 * EMA (Exponential Moving Average) Indicator
 *
 * Weighted moving average that gives more weight to recent values.
 * Responds faster to price changes than SMA.
 *
 * Formula:
 *   Multiplier (α) = 2 / (period + 1), unless given explicitly
 *   EMA = Value × α + EMA(previous) × (1 - α)
 *
 * The first EMA is the SMA of the first `period` values.
 *
 * Common periods:
 *   - 9: Very short-term (scalping)
 *   - 12: Short-term (MACD fast line)
 *   - 21: Short-term trend
 *   - 26: Medium-term (MACD slow line)
 *
 * @see https://www.investopedia.com/terms/e/ema.asp
 */

import { z } from "zod";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import type { IndicatorCalculator } from "../types";

export const EMAParamsSchema = z.object({
  period: periodSchema(),
  /** Explicit smoothing factor α in (0, 1] */
  multiplier: z.number().gt(0, "must be in range (0, 1]").lte(1, "must be in range (0, 1]").optional(),
});
export type EMAParams = z.infer<typeof EMAParamsSchema>;

/**
 * Common EMA periods.
 */
export const EMA_PERIODS = {
  SCALP: 9,
  MACD_FAST: 12,
  SHORT: 21,
  MACD_SLOW: 26,
} as const;

/**
 * Default EMA parameters.
 */
export const EMA_DEFAULTS: EMAParams = {
  period: EMA_PERIODS.SHORT,
};

/**
 * Standard EMA multiplier for a period: 2 / (period + 1).
 */
export function emaMultiplier(period: number): number {
  return 2 / (period + 1);
}

/**
 * Calculate EMA for a series of values.
 *
 * @param values - Input series (oldest first)
 * @param params - EMA parameters
 * @returns EMA series, NaN before index `period - 1`
 */
export function calculateEMA(values: readonly number[], params: EMAParams = EMA_DEFAULTS): number[] {
  const { period, multiplier } = parseParams("EMA", EMAParamsSchema, params);
  const alpha = multiplier ?? emaMultiplier(period);
  const result = new Array<number>(values.length).fill(Number.NaN);

  let sum = 0;
  let ema = Number.NaN;
  for (let i = 0; i < values.length; i++) {
    if (i < period) {
      sum += values[i];
      if (i === period - 1) {
        ema = sum / period;
        result[i] = ema;
      }
      continue;
    }
    ema = values[i] * alpha + ema * (1 - alpha);
    result[i] = ema;
  }

  return result;
}

/**
 * Streaming EMA. Buffers only the seed sum, then carries one scalar.
 */
export class EMAStream extends IndicatorStream<readonly number[], number, number> {
  readonly period: number;
  readonly alpha: number;
  private count = 0;
  private sum = 0;
  private ema: number | undefined;

  constructor(params: EMAParams = EMA_DEFAULTS) {
    super("EMA");
    const { period, multiplier } = parseParams("EMA", EMAParamsSchema, params);
    this.period = period;
    this.alpha = multiplier ?? emaMultiplier(period);
  }

  protected update(value: number): number | undefined {
    if (this.ema !== undefined) {
      this.ema = value * this.alpha + this.ema * (1 - this.alpha);
      return this.ema;
    }

    this.sum += value;
    this.count++;
    if (this.count === this.period) {
      this.ema = this.sum / this.period;
    }
    return this.ema;
  }

  protected clear(): void {
    this.count = 0;
    this.sum = 0;
    this.ema = undefined;
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

/**
 * Get the minimum number of values required for the first EMA.
 */
export function emaRequiredPeriods(params: EMAParams = EMA_DEFAULTS): number {
  return params.period;
}

/**
 * Calculate multiple EMAs at once.
 */
export function calculateMultipleEMAs(values: readonly number[], periods: readonly number[]): Map<number, number[]> {
  const results = new Map<number, number[]>();

  for (const period of periods) {
    results.set(period, calculateEMA(values, { period }));
  }

  return results;
}

/**
 * EMA calculator implementation.
 */
export const emaCalculator: IndicatorCalculator<EMAParams, readonly number[], number, number> = {
  name: "EMA",
  calculate: calculateEMA,
  requiredPeriods: emaRequiredPeriods,
  stream: (params) => new EMAStream(params),
};

export default emaCalculator;
