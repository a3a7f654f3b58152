/**
 * Stochastic Oscillator Indicator
 *
 * Developed by George Lane (1950s)
 * Compares closing price to price range over a period.
 *
 * Formula:
 *   Raw %K = 100 * (Close - Lowest Low) / (Highest High - Lowest Low)
 *            (50 when the range is zero)
 *
 * Fast Stochastic:
 *   %K = Raw %K
 *   %D = SMA of %K over dPeriod
 *
 * Slow Stochastic:
 *   %K = SMA of Raw %K over `slowing`
 *   %D = SMA of %K over dPeriod
 *
 * %D is NaN until its window fills.
 *
 * Interpretation:
 *   - > 80: Overbought
 *   - < 20: Oversold
 *   - Crossovers: %K crossing %D signals trend changes
 *
 * @see https://www.investopedia.com/terms/s/stochasticoscillator.asp
 */

import { z } from "zod";
import { MonotonicDeque } from "../core/monotonicDeque";
import { RunningSum } from "../core/runningSum";
import { hlcBars } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import { calculateSMAFrom } from "../trend/sma";
import type { HlcBar, HlcSeries, IndicatorCalculator, StochasticResult } from "../types";

export const StochasticParamsSchema = z.object({
  kPeriod: periodSchema(),
  dPeriod: periodSchema(),
  slowing: periodSchema().default(3),
  slow: z.boolean().default(true),
});
export type StochasticParams = z.input<typeof StochasticParamsSchema>;

/**
 * Default Stochastic parameters.
 */
export const STOCHASTIC_DEFAULTS: StochasticParams = {
  kPeriod: 14,
  dPeriod: 3,
  slowing: 3,
  slow: true,
};

/**
 * Stochastic overbought/oversold thresholds.
 */
export const STOCHASTIC_OVERBOUGHT = 80;
export const STOCHASTIC_OVERSOLD = 20;

/**
 * Position of `value` within [lowest, highest] scaled to 0-100.
 */
export function stochasticPosition(value: number, highest: number, lowest: number): number {
  const range = highest - lowest;
  return range === 0 ? 50 : (100 * (value - lowest)) / range;
}

function emptyStochastic(): StochasticResult {
  return { k: Number.NaN, d: Number.NaN };
}

/**
 * Calculate Stochastic %K/%D for every bar.
 *
 * @throws InvalidParameterError when high, low and close lengths differ
 */
export function calculateStochastic(
  series: HlcSeries,
  params: StochasticParams = STOCHASTIC_DEFAULTS
): StochasticResult[] {
  const { kPeriod, dPeriod, slowing, slow } = parseParams("Stochastic", StochasticParamsSchema, params);
  const bars = hlcBars("Stochastic", series);
  const result = bars.map(() => emptyStochastic());

  const rawK = new Array<number>(bars.length).fill(Number.NaN);
  for (let i = kPeriod - 1; i < bars.length; i++) {
    let highest = Number.NEGATIVE_INFINITY;
    let lowest = Number.POSITIVE_INFINITY;
    for (let j = i - kPeriod + 1; j <= i; j++) {
      highest = Math.max(highest, bars[j].high);
      lowest = Math.min(lowest, bars[j].low);
    }
    rawK[i] = stochasticPosition(bars[i].close, highest, lowest);
  }

  const kStart = slow ? kPeriod - 1 + slowing - 1 : kPeriod - 1;
  const kLine = slow ? calculateSMAFrom(rawK, kPeriod - 1, slowing) : rawK;
  const dLine = calculateSMAFrom(kLine, kStart, dPeriod);

  for (let i = kStart; i < bars.length; i++) {
    result[i] = { k: kLine[i], d: dLine[i] };
  }

  return result;
}

/**
 * Streaming Stochastic: windowed extremes from monotonic deques, %K and %D
 * smoothing from running sums.
 */
export class StochasticStream extends IndicatorStream<HlcSeries, HlcBar, StochasticResult> {
  readonly kPeriod: number;
  readonly slow: boolean;
  private readonly highs: MonotonicDeque;
  private readonly lows: MonotonicDeque;
  private readonly kSmoothing: RunningSum;
  private readonly dSmoothing: RunningSum;

  constructor(params: StochasticParams = STOCHASTIC_DEFAULTS) {
    super("Stochastic");
    const { kPeriod, dPeriod, slowing, slow } = parseParams("Stochastic", StochasticParamsSchema, params);
    this.kPeriod = kPeriod;
    this.slow = slow;
    this.highs = new MonotonicDeque("max", kPeriod);
    this.lows = new MonotonicDeque("min", kPeriod);
    this.kSmoothing = new RunningSum(slowing);
    this.dSmoothing = new RunningSum(dPeriod);
  }

  protected update(bar: HlcBar): StochasticResult | undefined {
    this.highs.push(bar.high);
    this.lows.push(bar.low);
    if (this.highs.seen < this.kPeriod) {
      return undefined;
    }

    let k = stochasticPosition(bar.close, this.highs.peek(), this.lows.peek());
    if (this.slow) {
      this.kSmoothing.push(k);
      if (!this.kSmoothing.isFull()) {
        return undefined;
      }
      k = this.kSmoothing.sum / this.kSmoothing.window;
    }

    this.dSmoothing.push(k);
    const d = this.dSmoothing.isFull() ? this.dSmoothing.sum / this.dSmoothing.window : Number.NaN;
    return { k, d };
  }

  protected clear(): void {
    this.highs.clear();
    this.lows.clear();
    this.kSmoothing.clear();
    this.dSmoothing.clear();
  }

  protected items(series: HlcSeries): readonly HlcBar[] {
    return hlcBars(this.name, series);
  }

  protected sentinel(): StochasticResult {
    return emptyStochastic();
  }
}

/**
 * Bars needed for the first %K.
 */
export function stochasticRequiredPeriods(params: StochasticParams = STOCHASTIC_DEFAULTS): number {
  const { kPeriod, slowing, slow } = parseParams("Stochastic", StochasticParamsSchema, params);
  return slow ? kPeriod + slowing - 1 : kPeriod;
}

/**
 * Check if Stochastic indicates overbought condition.
 */
export function isStochasticOverbought(k: number, threshold = STOCHASTIC_OVERBOUGHT): boolean {
  return k >= threshold;
}

/**
 * Check if Stochastic indicates oversold condition.
 */
export function isStochasticOversold(k: number, threshold = STOCHASTIC_OVERSOLD): boolean {
  return k <= threshold;
}

/**
 * Check for bullish crossover (%K crosses above %D).
 */
export function isBullishCrossover(prevK: number, prevD: number, currK: number, currD: number): boolean {
  return prevK <= prevD && currK > currD;
}

/**
 * Check for bearish crossover (%K crosses below %D).
 */
export function isBearishCrossover(prevK: number, prevD: number, currK: number, currD: number): boolean {
  return prevK >= prevD && currK < currD;
}

/**
 * Stochastic calculator implementation.
 */
export const stochasticCalculator: IndicatorCalculator<StochasticParams, HlcSeries, HlcBar, StochasticResult> = {
  name: "Stochastic",
  calculate: calculateStochastic,
  requiredPeriods: stochasticRequiredPeriods,
  stream: (params) => new StochasticStream(params),
};

export default stochasticCalculator;
