/**
 * Stochastic RSI Indicator
 *
 * Developed by Tushar Chande and Stanley Kroll (1994).
 * Applies the stochastic formula to RSI values instead of price.
 *
 * Stages:
 *   1. RSI over rsiPeriod
 *   2. StochRSI = 100 * (RSI - min RSI) / (max RSI - min RSI) over stochPeriod
 *      (50 when the range is zero)
 *   3. %K = SMA of StochRSI over kSmooth
 *   4. %D = SMA of %K over dPeriod
 *
 * %K becomes valid before %D; in between records read { k, d: NaN }.
 *
 * @see https://www.investopedia.com/terms/s/stochrsi.asp
 */

import { z } from "zod";
import { MonotonicDeque } from "../core/monotonicDeque";
import { RunningSum } from "../core/runningSum";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import { calculateSMAFrom } from "../trend/sma";
import type { IndicatorCalculator, StochasticResult } from "../types";
import { calculateRSI, RSIStream } from "./rsi";

export const StochRSIParamsSchema = z.object({
  rsiPeriod: periodSchema(),
  stochPeriod: periodSchema(),
  kSmooth: periodSchema(),
  dPeriod: periodSchema(),
});
export type StochRSIParams = z.infer<typeof StochRSIParamsSchema>;

export const STOCH_RSI_DEFAULTS: StochRSIParams = {
  rsiPeriod: 14,
  stochPeriod: 14,
  kSmooth: 3,
  dPeriod: 3,
};

function rsiPosition(rsi: number, highest: number, lowest: number): number {
  const range = highest - lowest;
  return range > 0 ? (100 * (rsi - lowest)) / range : 50;
}

/**
 * Calculate Stochastic RSI for a series of values.
 */
export function calculateStochRSI(
  values: readonly number[],
  params: StochRSIParams = STOCH_RSI_DEFAULTS
): StochasticResult[] {
  const { rsiPeriod, stochPeriod, kSmooth, dPeriod } = parseParams("StochRSI", StochRSIParamsSchema, params);
  const result = values.map<StochasticResult>(() => ({ k: Number.NaN, d: Number.NaN }));

  const rsi = calculateRSI(values, { period: rsiPeriod });
  const stochStart = rsiPeriod + stochPeriod - 1;
  const stoch = new Array<number>(values.length).fill(Number.NaN);
  for (let i = stochStart; i < values.length; i++) {
    let highest = Number.NEGATIVE_INFINITY;
    let lowest = Number.POSITIVE_INFINITY;
    for (let j = i - stochPeriod + 1; j <= i; j++) {
      highest = Math.max(highest, rsi[j]);
      lowest = Math.min(lowest, rsi[j]);
    }
    stoch[i] = rsiPosition(rsi[i], highest, lowest);
  }

  const kStart = stochStart + kSmooth - 1;
  const kLine = calculateSMAFrom(stoch, stochStart, kSmooth);
  const dLine = calculateSMAFrom(kLine, kStart, dPeriod);

  for (let i = kStart; i < values.length; i++) {
    result[i] = { k: kLine[i], d: dLine[i] };
  }

  return result;
}

/**
 * Streaming Stochastic RSI: RSI stream, windowed RSI extremes, then two
 * running-sum SMAs.
 */
export class StochRSIStream extends IndicatorStream<readonly number[], number, StochasticResult> {
  private readonly rsi: RSIStream;
  private readonly highest: MonotonicDeque;
  private readonly lowest: MonotonicDeque;
  private readonly kSmoothing: RunningSum;
  private readonly dSmoothing: RunningSum;
  private readonly stochPeriod: number;

  constructor(params: StochRSIParams = STOCH_RSI_DEFAULTS) {
    super("StochRSI");
    const { rsiPeriod, stochPeriod, kSmooth, dPeriod } = parseParams("StochRSI", StochRSIParamsSchema, params);
    this.stochPeriod = stochPeriod;
    this.rsi = new RSIStream({ period: rsiPeriod });
    this.highest = new MonotonicDeque("max", stochPeriod);
    this.lowest = new MonotonicDeque("min", stochPeriod);
    this.kSmoothing = new RunningSum(kSmooth);
    this.dSmoothing = new RunningSum(dPeriod);
  }

  protected update(value: number): StochasticResult | undefined {
    const rsi = this.rsi.next(value);
    if (rsi === undefined) {
      return undefined;
    }

    this.highest.push(rsi);
    this.lowest.push(rsi);
    if (this.highest.seen < this.stochPeriod) {
      return undefined;
    }

    this.kSmoothing.push(rsiPosition(rsi, this.highest.peek(), this.lowest.peek()));
    if (!this.kSmoothing.isFull()) {
      return undefined;
    }
    const k = this.kSmoothing.sum / this.kSmoothing.window;

    this.dSmoothing.push(k);
    const d = this.dSmoothing.isFull() ? this.dSmoothing.sum / this.dSmoothing.window : Number.NaN;
    return { k, d };
  }

  protected clear(): void {
    this.rsi.reset();
    this.highest.clear();
    this.lowest.clear();
    this.kSmoothing.clear();
    this.dSmoothing.clear();
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): StochasticResult {
    return { k: Number.NaN, d: Number.NaN };
  }
}

/**
 * Values needed for the first %K: rsiPeriod + stochPeriod + kSmooth - 1.
 */
export function stochRsiRequiredPeriods(params: StochRSIParams = STOCH_RSI_DEFAULTS): number {
  return params.rsiPeriod + params.stochPeriod + params.kSmooth - 1;
}

export const stochRsiCalculator: IndicatorCalculator<StochRSIParams, readonly number[], number, StochasticResult> = {
  name: "StochRSI",
  calculate: calculateStochRSI,
  requiredPeriods: stochRsiRequiredPeriods,
  stream: (params) => new StochRSIStream(params),
};

export default stochRsiCalculator;
