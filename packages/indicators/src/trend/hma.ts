/**
 * HMA (Hull Moving Average) Indicator
 *
 * Developed by Alan Hull (2005).
 * Reduces lag by combining two WMAs and smoothing the difference.
 *
 * Formula:
 *   half = floor(n / 2), root = max(1, floor(√n))
 *   raw  = 2 × WMA(half) - WMA(n)
 *   HMA  = WMA(root) of raw
 *
 * First value at index n + root - 2.
 *
 * @see https://alanhull.com/hull-moving-average
 */

import { z } from "zod";
import { IndicatorStream } from "../core/stream";
import { parseParams } from "../schemas";
import type { IndicatorCalculator } from "../types";
import { calculateWMA, WMAStream } from "./wma";

export const HMAParamsSchema = z.object({
  period: z.number().int("must be an integer").min(2, "must be at least 2"),
});
export type HMAParams = z.infer<typeof HMAParamsSchema>;

export const HMA_DEFAULTS: HMAParams = {
  period: 20,
};

function hmaWindows(period: number): { half: number; root: number } {
  return {
    half: Math.floor(period / 2),
    root: Math.max(1, Math.floor(Math.sqrt(period))),
  };
}

/**
 * Calculate HMA for a series of values.
 */
export function calculateHMA(values: readonly number[], params: HMAParams = HMA_DEFAULTS): number[] {
  const { period } = parseParams("HMA", HMAParamsSchema, params);
  const { half, root } = hmaWindows(period);
  const result = new Array<number>(values.length).fill(Number.NaN);

  if (values.length < period) {
    return result;
  }

  const halfWma = calculateWMA(values, { period: half });
  const fullWma = calculateWMA(values, { period });

  const raw: number[] = [];
  for (let i = period - 1; i < values.length; i++) {
    raw.push(2 * halfWma[i] - fullWma[i]);
  }

  const smoothed = calculateWMA(raw, { period: root });
  for (let j = 0; j < smoothed.length; j++) {
    result[period - 1 + j] = smoothed[j];
  }

  return result;
}

/**
 * Streaming HMA: three chained WMA streams.
 */
export class HMAStream extends IndicatorStream<readonly number[], number, number> {
  readonly period: number;
  private readonly halfWma: WMAStream;
  private readonly fullWma: WMAStream;
  private readonly rootWma: WMAStream;

  constructor(params: HMAParams = HMA_DEFAULTS) {
    super("HMA");
    this.period = parseParams("HMA", HMAParamsSchema, params).period;
    const { half, root } = hmaWindows(this.period);
    this.halfWma = new WMAStream({ period: half });
    this.fullWma = new WMAStream({ period: this.period });
    this.rootWma = new WMAStream({ period: root });
  }

  protected update(value: number): number | undefined {
    const half = this.halfWma.next(value);
    const full = this.fullWma.next(value);
    if (half === undefined || full === undefined) {
      return undefined;
    }
    return this.rootWma.next(2 * half - full);
  }

  protected clear(): void {
    this.halfWma.reset();
    this.fullWma.reset();
    this.rootWma.reset();
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

/**
 * Inputs needed for the first HMA: n + floor(√n) - 1.
 */
export function hmaRequiredPeriods(params: HMAParams = HMA_DEFAULTS): number {
  const { root } = hmaWindows(params.period);
  return params.period + root - 1;
}

export const hmaCalculator: IndicatorCalculator<HMAParams, readonly number[], number, number> = {
  name: "HMA",
  calculate: calculateHMA,
  requiredPeriods: hmaRequiredPeriods,
  stream: (params) => new HMAStream(params),
};

export default hmaCalculator;
