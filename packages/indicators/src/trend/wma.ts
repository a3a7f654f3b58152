/**
 * WMA (Weighted Moving Average) Indicator
 *
 * Linearly weighted average: the newest value carries weight n, the
 * oldest weight 1.
 *
 * Formula:
 *   WMA = (1·P1 + 2·P2 + ... + n·Pn) / (n(n+1)/2)
 *
 * The stream keeps the weighted and plain window sums and updates both in
 * O(1):
 *   weighted' = weighted - sum + x·n
 *   sum'      = sum - oldest + x
 *
 * @see https://www.investopedia.com/articles/technical/060401.asp
 */

import { z } from "zod";
import { RingBuffer } from "../core/ringBuffer";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import type { IndicatorCalculator } from "../types";

export const WMAParamsSchema = z.object({ period: periodSchema() });
export type WMAParams = z.infer<typeof WMAParamsSchema>;

export const WMA_DEFAULTS: WMAParams = {
  period: 20,
};

function weightDenominator(period: number): number {
  return (period * (period + 1)) / 2;
}

/**
 * Calculate WMA for a series of values.
 *
 * Each window is weighted directly; NaN before index `period - 1`.
 */
export function calculateWMA(values: readonly number[], params: WMAParams = WMA_DEFAULTS): number[] {
  const { period } = parseParams("WMA", WMAParamsSchema, params);
  const denominator = weightDenominator(period);
  const result = new Array<number>(values.length).fill(Number.NaN);

  for (let i = period - 1; i < values.length; i++) {
    let weighted = 0;
    const start = i - period + 1;
    for (let j = 0; j < period; j++) {
      weighted += values[start + j] * (j + 1);
    }
    result[i] = weighted / denominator;
  }

  return result;
}

/**
 * Streaming WMA with O(1) updates once the window is full.
 */
export class WMAStream extends IndicatorStream<readonly number[], number, number> {
  readonly period: number;
  private readonly denominator: number;
  private readonly window: RingBuffer;
  private weighted = 0;
  private sum = 0;

  constructor(params: WMAParams = WMA_DEFAULTS) {
    super("WMA");
    this.period = parseParams("WMA", WMAParamsSchema, params).period;
    this.denominator = weightDenominator(this.period);
    this.window = new RingBuffer(this.period);
  }

  protected update(value: number): number | undefined {
    if (!this.window.isFull()) {
      this.window.push(value);
      if (!this.window.isFull()) {
        return undefined;
      }
      // First full window: seed both sums directly
      const seed = this.window.toArray();
      for (let j = 0; j < seed.length; j++) {
        this.weighted += seed[j] * (j + 1);
        this.sum += seed[j];
      }
      return this.weighted / this.denominator;
    }

    const oldest = this.window.push(value) ?? 0;
    this.weighted = this.weighted - this.sum + value * this.period;
    this.sum = this.sum - oldest + value;
    return this.weighted / this.denominator;
  }

  protected clear(): void {
    this.window.clear();
    this.weighted = 0;
    this.sum = 0;
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

export function wmaRequiredPeriods(params: WMAParams = WMA_DEFAULTS): number {
  return params.period;
}

export const wmaCalculator: IndicatorCalculator<WMAParams, readonly number[], number, number> = {
  name: "WMA",
  calculate: calculateWMA,
  requiredPeriods: wmaRequiredPeriods,
  stream: (params) => new WMAStream(params),
};

export default wmaCalculator;
