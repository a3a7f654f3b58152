/**
 * ATR (Average True Range) Indicator
 *
 * Developed by J. Welles Wilder (1978)
 * Measures market volatility (non-directional).
 *
 * Formula:
 *   True Range = max(
 *     High - Low,
 *     |High - Previous Close|,
 *     |Low - Previous Close|
 *   )
 *   (the first bar uses High - Low)
 *   ATR = mean of the first `period` true ranges, then Wilder-smoothed
 *
 * Interpretation:
 *   - Higher ATR = Higher volatility
 *   - Used for stop-loss placement (e.g., 2x ATR)
 *
 * @see https://www.investopedia.com/terms/a/atr.asp
 */

import { z } from "zod";
import { hlcBars, trueRange } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { WilderSmoother } from "../core/wilder";
import { parseParams, periodSchema } from "../schemas";
import type { HlcBar, HlcSeries, IndicatorCalculator } from "../types";

export const ATRParamsSchema = z.object({ period: periodSchema() });
export type ATRParams = z.infer<typeof ATRParamsSchema>;

/**
 * Default ATR parameters (Wilder's standard).
 */
export const ATR_DEFAULTS: ATRParams = {
  period: 14,
};

/**
 * Calculate ATR for every bar.
 *
 * @param series - Parallel high/low/close arrays (oldest first)
 * @param params - ATR parameters
 * @returns ATR series, NaN before index period - 1
 * @throws InvalidParameterError when the arrays differ in length
 */
export function calculateATR(series: HlcSeries, params: ATRParams = ATR_DEFAULTS): number[] {
  const { period } = parseParams("ATR", ATRParamsSchema, params);
  const bars = hlcBars("ATR", series);
  const result = new Array<number>(bars.length).fill(Number.NaN);

  const alpha = 1 / period;
  let sum = 0;
  let atr = Number.NaN;
  for (let i = 0; i < bars.length; i++) {
    const tr = trueRange(bars[i], i > 0 ? bars[i - 1].close : undefined);
    if (i < period) {
      sum += tr;
      if (i === period - 1) {
        atr = sum / period;
        result[i] = atr;
      }
      continue;
    }
    atr = atr * (1 - alpha) + tr * alpha;
    result[i] = atr;
  }

  return result;
}

/**
 * Streaming ATR over a Wilder smoother of true range.
 */
export class ATRStream extends IndicatorStream<HlcSeries, HlcBar, number> {
  readonly period: number;
  private readonly smoother: WilderSmoother;
  private previousClose: number | undefined;

  constructor(params: ATRParams = ATR_DEFAULTS) {
    super("ATR");
    this.period = parseParams("ATR", ATRParamsSchema, params).period;
    this.smoother = new WilderSmoother(this.period);
  }

  protected update(bar: HlcBar): number | undefined {
    const tr = trueRange(bar, this.previousClose);
    this.previousClose = bar.close;
    return this.smoother.next(tr);
  }

  protected clear(): void {
    this.smoother.reset();
    this.previousClose = undefined;
  }

  protected items(series: HlcSeries): readonly HlcBar[] {
    return hlcBars(this.name, series);
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

/**
 * Get the minimum number of bars required for the first ATR.
 */
export function atrRequiredPeriods(params: ATRParams = ATR_DEFAULTS): number {
  return params.period;
}

/**
 * Calculate stop-loss distance based on ATR.
 *
 * @param atr - Current ATR value
 * @param multiplier - ATR multiplier (e.g., 2.0 for 2x ATR)
 */
export function calculateATRStop(atr: number, multiplier = 2.0): number {
  return atr * multiplier;
}

/**
 * ATR Calculator implementation.
 */
export const atrCalculator: IndicatorCalculator<ATRParams, HlcSeries, HlcBar, number> = {
  name: "ATR",
  calculate: calculateATR,
  requiredPeriods: atrRequiredPeriods,
  stream: (params) => new ATRStream(params),
};

export default atrCalculator;
