/**
 * MACD (Moving Average Convergence Divergence) Indicator
 *
 * Developed by Gerald Appel (1970s).
 *
 * Formula:
 *   MACD Line   = EMA(fast) - EMA(slow)
 *   Signal Line = EMA or SMA of the MACD line over `signalPeriod`
 *   Histogram   = MACD Line - Signal Line
 *
 * The MACD line starts at index slowPeriod - 1; the signal is computed over
 * that valid subsequence and is NaN until it warms up.
 *
 * @see https://www.investopedia.com/terms/m/macd.asp
 */

import { z } from "zod";
import { IndicatorStream } from "../core/stream";
import { MACDSignalType, parseParams, periodSchema } from "../schemas";
import type { IndicatorCalculator, MACDResult } from "../types";
import { calculateEMA, EMAStream } from "./ema";
import { calculateSMA, SMAStream } from "./sma";

export const MACDParamsSchema = z
  .object({
    fastPeriod: periodSchema(),
    slowPeriod: periodSchema(),
    signalPeriod: periodSchema(),
    signalType: MACDSignalType.default("ema"),
  })
  .refine((p) => p.fastPeriod < p.slowPeriod, {
    message: "fastPeriod must be less than slowPeriod",
  });
export type MACDParams = z.input<typeof MACDParamsSchema>;

export const MACD_DEFAULTS: MACDParams = {
  fastPeriod: 12,
  slowPeriod: 26,
  signalPeriod: 9,
  signalType: "ema",
};

function emptyMACD(): MACDResult {
  return { macd: Number.NaN, signal: Number.NaN, histogram: Number.NaN };
}

/**
 * Calculate MACD for a series of values.
 *
 * @param values - Input series (oldest first)
 * @param params - MACD parameters
 * @returns One record per input; NaN fields before index slowPeriod - 1
 */
export function calculateMACD(values: readonly number[], params: MACDParams = MACD_DEFAULTS): MACDResult[] {
  const { fastPeriod, slowPeriod, signalPeriod, signalType } = parseParams("MACD", MACDParamsSchema, params);
  const result = values.map(() => emptyMACD());

  if (values.length < slowPeriod) {
    return result;
  }

  const fast = calculateEMA(values, { period: fastPeriod });
  const slow = calculateEMA(values, { period: slowPeriod });

  const start = slowPeriod - 1;
  const macdLine: number[] = [];
  for (let i = start; i < values.length; i++) {
    macdLine.push(fast[i] - slow[i]);
  }

  const signalLine =
    signalType === "sma"
      ? calculateSMA(macdLine, { period: signalPeriod })
      : calculateEMA(macdLine, { period: signalPeriod });

  for (let j = 0; j < macdLine.length; j++) {
    const macd = macdLine[j];
    const signal = signalLine[j];
    result[start + j] = {
      macd,
      signal,
      histogram: Number.isNaN(signal) ? Number.NaN : macd - signal,
    };
  }

  return result;
}

/**
 * Streaming MACD: two EMA streams feeding an EMA or SMA signal stream.
 */
export class MACDStream extends IndicatorStream<readonly number[], number, MACDResult> {
  private readonly fast: EMAStream;
  private readonly slow: EMAStream;
  private readonly signal: EMAStream | SMAStream;

  constructor(params: MACDParams = MACD_DEFAULTS) {
    super("MACD");
    const { fastPeriod, slowPeriod, signalPeriod, signalType } = parseParams("MACD", MACDParamsSchema, params);
    this.fast = new EMAStream({ period: fastPeriod });
    this.slow = new EMAStream({ period: slowPeriod });
    this.signal =
      signalType === "sma" ? new SMAStream({ period: signalPeriod }) : new EMAStream({ period: signalPeriod });
  }

  protected update(value: number): MACDResult | undefined {
    const fast = this.fast.next(value);
    const slow = this.slow.next(value);
    if (fast === undefined || slow === undefined) {
      return undefined;
    }

    const macd = fast - slow;
    const signal = this.signal.next(macd);
    if (signal === undefined) {
      return { macd, signal: Number.NaN, histogram: Number.NaN };
    }
    return { macd, signal, histogram: macd - signal };
  }

  protected clear(): void {
    this.fast.reset();
    this.slow.reset();
    this.signal.reset();
  }

  protected items(values: readonly number[]): readonly number[] {
    return values;
  }

  protected sentinel(): MACDResult {
    return emptyMACD();
  }
}

/**
 * Inputs needed for the first MACD line value.
 */
export function macdRequiredPeriods(params: MACDParams = MACD_DEFAULTS): number {
  return params.slowPeriod;
}

/**
 * Check for a bullish crossover (MACD crosses above signal).
 */
export function isMACDBullishCrossover(prev: MACDResult, curr: MACDResult): boolean {
  return prev.macd <= prev.signal && curr.macd > curr.signal;
}

/**
 * Check for a bearish crossover (MACD crosses below signal).
 */
export function isMACDBearishCrossover(prev: MACDResult, curr: MACDResult): boolean {
  return prev.macd >= prev.signal && curr.macd < curr.signal;
}

export const macdCalculator: IndicatorCalculator<MACDParams, readonly number[], number, MACDResult> = {
  name: "MACD",
  calculate: calculateMACD,
  requiredPeriods: macdRequiredPeriods,
  stream: (params) => new MACDStream(params),
};

export default macdCalculator;
