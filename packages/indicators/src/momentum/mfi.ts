/**
 * MFI (Money Flow Index) Indicator
 *
 * Developed by Gene Quong and Avrum Soudack.
 * Volume-weighted RSI built on typical price.
 *
 * Formula:
 *   Typical Price (TP) = (High + Low + Close) / 3
 *   Raw Money Flow     = TP × Volume
 *   Positive flow when TP rises versus the previous bar, negative when it falls
 *   MFI = 100 - 100 / (1 + positive flow / negative flow) over `period` bars
 *
 * No negative flow reads 100; no positive flow reads 0.
 * First value at index `period`.
 *
 * @see https://www.investopedia.com/terms/m/mfi.asp
 */

import { z } from "zod";
import { RunningSum } from "../core/runningSum";
import { hlcvBars, typicalPrice } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import type { HlcvBar, HlcvSeries, IndicatorCalculator } from "../types";

export const MFIParamsSchema = z.object({ period: periodSchema() });
export type MFIParams = z.infer<typeof MFIParamsSchema>;

export const MFI_DEFAULTS: MFIParams = {
  period: 14,
};

export const MFI_OVERBOUGHT = 80;
export const MFI_OVERSOLD = 20;

export function mfiFromFlows(positive: number, negative: number): number {
  if (negative === 0) {
    return 100;
  }
  if (positive === 0) {
    return 0;
  }
  return 100 - 100 / (1 + positive / negative);
}

/**
 * Calculate MFI for every bar.
 *
 * @throws InvalidParameterError when the four input arrays differ in length
 */
export function calculateMFI(series: HlcvSeries, params: MFIParams = MFI_DEFAULTS): number[] {
  const { period } = parseParams("MFI", MFIParamsSchema, params);
  const bars = hlcvBars("MFI", series);
  const result = new Array<number>(bars.length).fill(Number.NaN);

  const positive = new Array<number>(bars.length).fill(0);
  const negative = new Array<number>(bars.length).fill(0);
  for (let i = 1; i < bars.length; i++) {
    const tp = typicalPrice(bars[i]);
    const prevTp = typicalPrice(bars[i - 1]);
    const flow = tp * bars[i].volume;
    if (tp > prevTp) {
      positive[i] = flow;
    } else if (tp < prevTp) {
      negative[i] = flow;
    }
  }

  // Sliding sums over flows (i - period, i]
  let positiveSum = 0;
  let negativeSum = 0;
  for (let i = 1; i < bars.length; i++) {
    positiveSum += positive[i];
    negativeSum += negative[i];
    if (i > period) {
      positiveSum -= positive[i - period];
      negativeSum -= negative[i - period];
    }
    if (i >= period) {
      result[i] = mfiFromFlows(positiveSum, negativeSum);
    }
  }

  return result;
}

/**
 * Streaming MFI with ring-buffered positive and negative flows.
 */
export class MFIStream extends IndicatorStream<HlcvSeries, HlcvBar, number> {
  readonly period: number;
  private readonly positive: RunningSum;
  private readonly negative: RunningSum;
  private previousTp: number | undefined;

  constructor(params: MFIParams = MFI_DEFAULTS) {
    super("MFI");
    this.period = parseParams("MFI", MFIParamsSchema, params).period;
    this.positive = new RunningSum(this.period);
    this.negative = new RunningSum(this.period);
  }

  protected update(bar: HlcvBar): number | undefined {
    const tp = typicalPrice(bar);
    const previousTp = this.previousTp;
    this.previousTp = tp;
    if (previousTp === undefined) {
      return undefined;
    }

    const flow = tp * bar.volume;
    this.positive.push(tp > previousTp ? flow : 0);
    this.negative.push(tp < previousTp ? flow : 0);
    if (!this.positive.isFull()) {
      return undefined;
    }
    return mfiFromFlows(this.positive.sum, this.negative.sum);
  }

  protected clear(): void {
    this.positive.clear();
    this.negative.clear();
    this.previousTp = undefined;
  }

  protected items(series: HlcvSeries): readonly HlcvBar[] {
    return hlcvBars(this.name, series);
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

export function mfiRequiredPeriods(params: MFIParams = MFI_DEFAULTS): number {
  return params.period + 1;
}

export const mfiCalculator: IndicatorCalculator<MFIParams, HlcvSeries, HlcvBar, number> = {
  name: "MFI",
  calculate: calculateMFI,
  requiredPeriods: mfiRequiredPeriods,
  stream: (params) => new MFIStream(params),
};

export default mfiCalculator;
