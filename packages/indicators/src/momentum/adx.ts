/**
 * ADX (Average Directional Index) Indicator
 *
 * Developed by J. Welles Wilder (1978).
 * Measures trend strength regardless of direction.
 *
 * Per bar (from the second):
 *   up   = High - previous High
 *   down = previous Low - Low
 *   +DM  = up   if up > down and up > 0, else 0
 *   -DM  = down if down > up and down > 0, else 0
 *
 * TR, +DM and -DM are Wilder-smoothed as running sums (seeded with the plain
 * sum of the first `period` samples, then s - s/period + x):
 *   +DI = 100 × smoothed +DM / smoothed TR
 *   -DI = 100 × smoothed -DM / smoothed TR
 *   DX  = 100 × |+DI - -DI| / (+DI + -DI)
 *   ADX = Wilder average of DX, seeded with the mean of the first `period` DX
 *
 * +DI/-DI first appear at index `period`, ADX at index 2 × period - 1.
 *
 * Interpretation:
 *   - ADX > 25: Trending market
 *   - ADX < 20: Weak or absent trend
 *
 * @see https://www.investopedia.com/terms/a/adx.asp
 */

import { z } from "zod";
import { hlcBars, trueRange } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { WilderSmoother } from "../core/wilder";
import { parseParams, periodSchema } from "../schemas";
import type { ADXResult, HlcBar, HlcSeries, IndicatorCalculator } from "../types";

export const ADXParamsSchema = z.object({ period: periodSchema() });
export type ADXParams = z.infer<typeof ADXParamsSchema>;

export const ADX_DEFAULTS: ADXParams = {
  period: 14,
};

/** Conventional trend-strength threshold */
export const ADX_TREND_THRESHOLD = 25;

interface DirectionalMove {
  plus: number;
  minus: number;
}

export function directionalMove(bar: HlcBar, previous: HlcBar): DirectionalMove {
  const up = bar.high - previous.high;
  const down = previous.low - bar.low;
  return {
    plus: up > down && up > 0 ? up : 0,
    minus: down > up && down > 0 ? down : 0,
  };
}

interface DirectionalIndex {
  plusDi: number;
  minusDi: number;
  dx: number;
}

function directionalIndex(smoothedTr: number, smoothedPlus: number, smoothedMinus: number): DirectionalIndex {
  if (smoothedTr === 0) {
    return { plusDi: 0, minusDi: 0, dx: 0 };
  }
  const plusDi = (100 * smoothedPlus) / smoothedTr;
  const minusDi = (100 * smoothedMinus) / smoothedTr;
  const sum = plusDi + minusDi;
  return {
    plusDi,
    minusDi,
    dx: sum === 0 ? 0 : (100 * Math.abs(plusDi - minusDi)) / sum,
  };
}

function emptyADX(): ADXResult {
  return { adx: Number.NaN, plusDi: Number.NaN, minusDi: Number.NaN };
}

/**
 * Calculate ADX, +DI and -DI for every bar.
 *
 * @throws InvalidParameterError when high, low and close lengths differ
 */
export function calculateADX(series: HlcSeries, params: ADXParams = ADX_DEFAULTS): ADXResult[] {
  const { period } = parseParams("ADX", ADXParamsSchema, params);
  const bars = hlcBars("ADX", series);
  const result = bars.map(() => emptyADX());

  if (bars.length <= period) {
    return result;
  }

  let smoothedTr = 0;
  let smoothedPlus = 0;
  let smoothedMinus = 0;
  let dxSum = 0;
  let dxCount = 0;
  let adx: number | undefined;
  const alpha = 1 / period;

  for (let i = 1; i < bars.length; i++) {
    const tr = trueRange(bars[i], bars[i - 1].close);
    const move = directionalMove(bars[i], bars[i - 1]);

    if (i <= period) {
      smoothedTr += tr;
      smoothedPlus += move.plus;
      smoothedMinus += move.minus;
      if (i < period) {
        continue;
      }
    } else {
      smoothedTr = smoothedTr - smoothedTr / period + tr;
      smoothedPlus = smoothedPlus - smoothedPlus / period + move.plus;
      smoothedMinus = smoothedMinus - smoothedMinus / period + move.minus;
    }

    const { plusDi, minusDi, dx } = directionalIndex(smoothedTr, smoothedPlus, smoothedMinus);
    dxCount++;
    if (adx === undefined) {
      dxSum += dx;
      if (dxCount === period) {
        adx = dxSum / period;
      }
    } else {
      adx = adx * (1 - alpha) + dx * alpha;
    }

    result[i] = { adx: adx ?? Number.NaN, plusDi, minusDi };
  }

  return result;
}

/**
 * Streaming ADX. Emits +DI/-DI from index `period` with ADX NaN until the
 * DX average is seeded.
 */
export class ADXStream extends IndicatorStream<HlcSeries, HlcBar, ADXResult> {
  readonly period: number;
  private readonly tr: WilderSmoother;
  private readonly plusDm: WilderSmoother;
  private readonly minusDm: WilderSmoother;
  private readonly adx: WilderSmoother;
  private previous: HlcBar | undefined;

  constructor(params: ADXParams = ADX_DEFAULTS) {
    super("ADX");
    this.period = parseParams("ADX", ADXParamsSchema, params).period;
    this.tr = new WilderSmoother(this.period, "sum");
    this.plusDm = new WilderSmoother(this.period, "sum");
    this.minusDm = new WilderSmoother(this.period, "sum");
    this.adx = new WilderSmoother(this.period, "mean");
  }

  protected update(bar: HlcBar): ADXResult | undefined {
    const previous = this.previous;
    this.previous = bar;
    if (previous === undefined) {
      return undefined;
    }

    const move = directionalMove(bar, previous);
    const tr = this.tr.next(trueRange(bar, previous.close));
    const plus = this.plusDm.next(move.plus);
    const minus = this.minusDm.next(move.minus);
    if (tr === undefined || plus === undefined || minus === undefined) {
      return undefined;
    }

    const { plusDi, minusDi, dx } = directionalIndex(tr, plus, minus);
    return { adx: this.adx.next(dx) ?? Number.NaN, plusDi, minusDi };
  }

  protected clear(): void {
    this.tr.reset();
    this.plusDm.reset();
    this.minusDm.reset();
    this.adx.reset();
    this.previous = undefined;
  }

  protected items(series: HlcSeries): readonly HlcBar[] {
    return hlcBars(this.name, series);
  }

  protected sentinel(): ADXResult {
    return emptyADX();
  }
}

/**
 * Bars needed for the first ADX value: 2 × period.
 */
export function adxRequiredPeriods(params: ADXParams = ADX_DEFAULTS): number {
  return params.period * 2;
}

/**
 * Check whether ADX signals a trending market.
 */
export function isTrending(adx: number, threshold = ADX_TREND_THRESHOLD): boolean {
  return adx >= threshold;
}

export const adxCalculator: IndicatorCalculator<ADXParams, HlcSeries, HlcBar, ADXResult> = {
  name: "ADX",
  calculate: calculateADX,
  requiredPeriods: adxRequiredPeriods,
  stream: (params) => new ADXStream(params),
};

export default adxCalculator;
