/**
 * CVD (Cumulative Volume Delta)
 *
 * Running sum of per-bar buying minus selling pressure.
 *
 * Direct mode consumes signed deltas. A NaN delta is reported as NaN and
 * leaves the running total untouched.
 *
 * OHLCV mode estimates each bar's delta from where it closed in its range:
 *   delta = Volume × (2·Close - High - Low) / (High - Low)
 *   (0 when the range or the volume is not positive)
 *
 * @see https://www.tradingview.com/support/solutions/43000725058-cumulative-volume-delta/
 */

import { hlcvBars } from "../core/series";
import { IndicatorStream } from "../core/stream";
import type { HlcvBar, HlcvSeries, IndicatorCalculator } from "../types";

/**
 * Approximate volume delta of one bar.
 */
export function volumeDelta(bar: HlcvBar): number {
  const range = bar.high - bar.low;
  if (range <= 0 || bar.volume <= 0) {
    return 0;
  }
  return (bar.volume * (2 * bar.close - bar.high - bar.low)) / range;
}

/**
 * Prefix sum of signed deltas.
 */
export function calculateCVD(deltas: readonly number[]): number[] {
  const result = new Array<number>(deltas.length);
  let total = 0;
  for (let i = 0; i < deltas.length; i++) {
    const delta = deltas[i];
    if (Number.isNaN(delta)) {
      result[i] = Number.NaN;
      continue;
    }
    total += delta;
    result[i] = total;
  }
  return result;
}

/**
 * CVD from bars, each delta estimated with {@link volumeDelta}.
 *
 * @throws InvalidParameterError when the four input arrays differ in length
 */
export function calculateCVDFromBars(series: HlcvSeries): number[] {
  return calculateCVD(hlcvBars("CVD", series).map(volumeDelta));
}

/**
 * Streaming CVD over signed deltas.
 */
export class CVDStream extends IndicatorStream<readonly number[], number, number> {
  private running = 0;

  constructor() {
    super("CVD");
  }

  /** Running total, unaffected by NaN deltas */
  total(): number {
    return this.running;
  }

  protected update(delta: number): number {
    if (Number.isNaN(delta)) {
      return Number.NaN;
    }
    this.running += delta;
    return this.running;
  }

  protected clear(): void {
    this.running = 0;
  }

  protected items(deltas: readonly number[]): readonly number[] {
    return deltas;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

/**
 * Streaming CVD over bars.
 */
export class BarCVDStream extends IndicatorStream<HlcvSeries, HlcvBar, number> {
  private running = 0;

  constructor() {
    super("CVD");
  }

  total(): number {
    return this.running;
  }

  protected update(bar: HlcvBar): number {
    this.running += volumeDelta(bar);
    return this.running;
  }

  protected clear(): void {
    this.running = 0;
  }

  protected items(series: HlcvSeries): readonly HlcvBar[] {
    return hlcvBars(this.name, series);
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

export const cvdCalculator: IndicatorCalculator<Record<string, never>, HlcvSeries, HlcvBar, number> = {
  name: "CVD",
  calculate: (series) => calculateCVDFromBars(series),
  requiredPeriods: () => 1,
  stream: () => new BarCVDStream(),
};
