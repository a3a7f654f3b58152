/**
 * Linear Regression Channel
 *
 * Least-squares line fitted to the last `period` values with
 * x = 0 … period - 1. Reports the line's value at the window end, the slope,
 * Pearson r and r², and bands at ± multiplier × residual standard deviation.
 *
 * Formula:
 *   slope     = Σ(x - x̄)(y - ȳ) / Σ(x - x̄)²
 *   intercept = ȳ - slope × x̄
 *   value     = slope × (period - 1) + intercept
 *   r         = Σ(x - x̄)(y - ȳ) / √(Σ(x - x̄)² × Σ(y - ȳ)²), 0 for a flat window
 *   σ         = √(Σ residual² / period)
 *
 * The stream recomputes each window in O(period) from its ring buffer.
 *
 * @see https://www.investopedia.com/terms/l/linearregression.asp
 */

import { z } from "zod";
import { RingBuffer } from "../core/ringBuffer";
import { IndicatorStream } from "../core/stream";
import { parseParams } from "../schemas";
import type { IndicatorCalculator, LinearRegressionResult } from "../types";

export const LinearRegressionParamsSchema = z.object({
  period: z.number().int("must be an integer").min(2, "must be at least 2 for regression"),
  multiplier: z.number().min(0, "must be non-negative").finite("must be finite"),
});
export type LinearRegressionParams = z.infer<typeof LinearRegressionParamsSchema>;

export const LINEAR_REGRESSION_DEFAULTS: LinearRegressionParams = {
  period: 20,
  multiplier: 2.0,
};

/**
 * Fit one window (oldest first).
 */
export function regressWindow(window: readonly number[], multiplier: number): LinearRegressionResult {
  const n = window.length;
  const xMean = (n - 1) / 2;
  let yMean = 0;
  for (const y of window) {
    yMean += y;
  }
  yMean /= n;

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = i - xMean;
    const dy = window[i] - yMean;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  const slope = sxx !== 0 ? sxy / sxx : 0;
  const intercept = yMean - slope * xMean;
  const value = slope * (n - 1) + intercept;
  // Rounding can push |r| a hair past 1 on perfectly linear windows
  const r = sxx !== 0 && syy !== 0 ? Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy))) : 0;

  let residualSquares = 0;
  for (let i = 0; i < n; i++) {
    const residual = window[i] - (slope * i + intercept);
    residualSquares += residual * residual;
  }
  const sigma = Math.sqrt(residualSquares / n);

  return {
    value,
    upper: value + multiplier * sigma,
    lower: value - multiplier * sigma,
    slope,
    r,
    rSquared: r * r,
  };
}

function emptyRegression(): LinearRegressionResult {
  return {
    value: Number.NaN,
    upper: Number.NaN,
    lower: Number.NaN,
    slope: Number.NaN,
    r: Number.NaN,
    rSquared: Number.NaN,
  };
}

/**
 * Calculate the regression channel for every window.
 */
export function calculateLinearRegression(
  values: readonly number[],
  params: LinearRegressionParams = LINEAR_REGRESSION_DEFAULTS
): LinearRegressionResult[] {
  const { period, multiplier } = parseParams("LinearRegression", LinearRegressionParamsSchema, params);
  const result = values.map(() => emptyRegression());

  for (let i = period - 1; i < values.length; i++) {
    result[i] = regressWindow(values.slice(i - period + 1, i + 1), multiplier);
  }

  return result;
}

export class LinearRegressionStream extends IndicatorStream<readonly number[], number, LinearRegressionResult> {
  readonly period: number;
  readonly multiplier: number;
  private readonly window: RingBuffer;

  constructor(params: LinearRegressionParams = LINEAR_REGRESSION_DEFAULTS) {
    super("LinearRegression");
    const { period, multiplier } = parseParams("LinearRegression", LinearRegressionParamsSchema, params);
    this.period = period;
    this.multiplier = multiplier;
    this.window = new RingBuffer(period);
  }

  protected update(value: number): LinearRegressionResult | undefined {
    this.window.push(value);
    if (!this.window.isFull()) {
      return undefined;
    }
    return regressWindow(this.window.toArray(), this.multiplier);
  }

  protected clear(): void {
    this.window.clear();
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): LinearRegressionResult {
    return emptyRegression();
  }
}

export function linearRegressionRequiredPeriods(
  params: LinearRegressionParams = LINEAR_REGRESSION_DEFAULTS
): number {
  return params.period;
}

export const linearRegressionCalculator: IndicatorCalculator<
  LinearRegressionParams,
  readonly number[],
  number,
  LinearRegressionResult
> = {
  name: "LinearRegression",
  calculate: calculateLinearRegression,
  requiredPeriods: linearRegressionRequiredPeriods,
  stream: (params) => new LinearRegressionStream(params),
};

export default linearRegressionCalculator;
