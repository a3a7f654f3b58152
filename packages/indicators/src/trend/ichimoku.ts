/**
 * Ichimoku Cloud (Ichimoku Kinko Hyo)
 *
 * Developed by Goichi Hosoda (1960s).
 *
 * Components (midpoint = (highest high + lowest low) / 2):
 *   Tenkan-sen  = midpoint over tenkanPeriod (9)
 *   Kijun-sen   = midpoint over kijunPeriod (26)
 *   Senkou A    = (Tenkan + Kijun) / 2
 *   Senkou B    = midpoint over senkouBPeriod (52)
 *   Chikou      = current close
 *
 * Values are reported unshifted. Plotting Senkou A/B forward and Chikou
 * back by kijunPeriod is left to the consumer.
 *
 * @see https://www.investopedia.com/terms/i/ichimoku-cloud.asp
 */

import { z } from "zod";
import { MonotonicDeque } from "../core/monotonicDeque";
import { hlcBars } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import type { HlcBar, HlcSeries, IchimokuResult, IndicatorCalculator } from "../types";

export const IchimokuParamsSchema = z.object({
  tenkanPeriod: periodSchema(),
  kijunPeriod: periodSchema(),
  senkouBPeriod: periodSchema(),
});
export type IchimokuParams = z.infer<typeof IchimokuParamsSchema>;

export const ICHIMOKU_DEFAULTS: IchimokuParams = {
  tenkanPeriod: 9,
  kijunPeriod: 26,
  senkouBPeriod: 52,
};

function midpointAt(series: HlcSeries, end: number, period: number): number {
  if (end < period - 1) {
    return Number.NaN;
  }
  let highest = Number.NEGATIVE_INFINITY;
  let lowest = Number.POSITIVE_INFINITY;
  for (let i = end - period + 1; i <= end; i++) {
    highest = Math.max(highest, series.high[i]);
    lowest = Math.min(lowest, series.low[i]);
  }
  return (highest + lowest) / 2;
}

function senkouA(tenkan: number, kijun: number): number {
  return Number.isNaN(tenkan) || Number.isNaN(kijun) ? Number.NaN : (tenkan + kijun) / 2;
}

/**
 * Calculate Ichimoku components for every bar.
 *
 * @throws InvalidParameterError when high, low and close lengths differ
 */
export function calculateIchimoku(series: HlcSeries, params: IchimokuParams = ICHIMOKU_DEFAULTS): IchimokuResult[] {
  const { tenkanPeriod, kijunPeriod, senkouBPeriod } = parseParams("Ichimoku", IchimokuParamsSchema, params);
  const bars = hlcBars("Ichimoku", series);

  return bars.map((bar, i) => {
    const tenkan = midpointAt(series, i, tenkanPeriod);
    const kijun = midpointAt(series, i, kijunPeriod);
    return {
      tenkan,
      kijun,
      senkouA: senkouA(tenkan, kijun),
      senkouB: midpointAt(series, i, senkouBPeriod),
      chikou: bar.close,
    };
  });
}

/**
 * Donchian midpoint over a sliding window using a max/min deque pair.
 */
class MidpointWindow {
  private readonly highs: MonotonicDeque;
  private readonly lows: MonotonicDeque;

  constructor(readonly period: number) {
    this.highs = new MonotonicDeque("max", period);
    this.lows = new MonotonicDeque("min", period);
  }

  push(bar: HlcBar): number {
    this.highs.push(bar.high);
    this.lows.push(bar.low);
    return this.highs.seen < this.period ? Number.NaN : (this.highs.peek() + this.lows.peek()) / 2;
  }

  clear(): void {
    this.highs.clear();
    this.lows.clear();
  }
}

/**
 * Streaming Ichimoku. Emits a record for every bar; components still
 * warming up are NaN.
 */
export class IchimokuStream extends IndicatorStream<HlcSeries, HlcBar, IchimokuResult> {
  private readonly tenkan: MidpointWindow;
  private readonly kijun: MidpointWindow;
  private readonly senkouB: MidpointWindow;

  private readonly warmup: number;
  private seen = 0;

  constructor(params: IchimokuParams = ICHIMOKU_DEFAULTS) {
    super("Ichimoku");
    const { tenkanPeriod, kijunPeriod, senkouBPeriod } = parseParams("Ichimoku", IchimokuParamsSchema, params);
    this.tenkan = new MidpointWindow(tenkanPeriod);
    this.kijun = new MidpointWindow(kijunPeriod);
    this.senkouB = new MidpointWindow(senkouBPeriod);
    this.warmup = Math.max(tenkanPeriod, kijunPeriod, senkouBPeriod);
  }

  /**
   * True once every component is populated. `current()` is available
   * from the first bar, with warming-up components set to NaN.
   */
  override isReady(): boolean {
    return this.seen >= this.warmup;
  }

  protected update(bar: HlcBar): IchimokuResult {
    this.seen++;
    const tenkan = this.tenkan.push(bar);
    const kijun = this.kijun.push(bar);
    return {
      tenkan,
      kijun,
      senkouA: senkouA(tenkan, kijun),
      senkouB: this.senkouB.push(bar),
      chikou: bar.close,
    };
  }

  protected clear(): void {
    this.tenkan.clear();
    this.kijun.clear();
    this.senkouB.clear();
    this.seen = 0;
  }

  protected items(series: HlcSeries): readonly HlcBar[] {
    return hlcBars(this.name, series);
  }

  protected sentinel(): IchimokuResult {
    return {
      tenkan: Number.NaN,
      kijun: Number.NaN,
      senkouA: Number.NaN,
      senkouB: Number.NaN,
      chikou: Number.NaN,
    };
  }
}

/**
 * Bars needed before every component is populated.
 */
export function ichimokuRequiredPeriods(params: IchimokuParams = ICHIMOKU_DEFAULTS): number {
  return Math.max(params.tenkanPeriod, params.kijunPeriod, params.senkouBPeriod);
}

/**
 * Check whether price trades above both cloud boundaries.
 */
export function isAboveCloud(price: number, result: IchimokuResult): boolean {
  return price > Math.max(result.senkouA, result.senkouB);
}

export const ichimokuCalculator: IndicatorCalculator<IchimokuParams, HlcSeries, HlcBar, IchimokuResult> = {
  name: "Ichimoku",
  calculate: calculateIchimoku,
  requiredPeriods: ichimokuRequiredPeriods,
  stream: (params) => new IchimokuStream(params),
};

export default ichimokuCalculator;
