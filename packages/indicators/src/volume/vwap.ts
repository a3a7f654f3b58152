/**
 * VWAP (Volume-Weighted Average Price)
 *
 * VWAP = Σ(Typical Price × Volume) / Σ(Volume), Typical Price = (H + L + C) / 3
 *
 * Variants:
 *   - Session:  accumulates within a UTC day, resetting on the first bar of
 *               a new day number (floor(timestamp / 86,400,000))
 *   - Rolling:  sums over the last `period` bars
 *   - Anchored: accumulates from an anchor bar onward
 *
 * Any position whose accumulated volume is not positive is absent (NaN in
 * batch output, undefined from a stream).
 *
 * Venues whose sessions do not start at 00:00 UTC should offset timestamps
 * before calling.
 *
 * @see https://www.investopedia.com/terms/v/vwap.asp
 */

import { z } from "zod";
import { RunningSum } from "../core/runningSum";
import { typicalPrice } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { parseParams, periodSchema } from "../schemas";
import type { Candle, IndicatorCalculator } from "../types";

export const MS_PER_DAY = 86_400_000;

/**
 * UTC day number of a millisecond timestamp.
 */
export function utcDay(timestamp: number): number {
  return Math.floor(timestamp / MS_PER_DAY);
}

function vwapOf(tpVolume: number, volume: number): number | undefined {
  return volume > 0 ? tpVolume / volume : undefined;
}

// ============================================
// Session VWAP
// ============================================

/**
 * Session VWAP for every candle.
 */
export function calculateSessionVWAP(candles: readonly Candle[]): number[] {
  const result = new Array<number>(candles.length).fill(Number.NaN);
  let cumTpVolume = 0;
  let cumVolume = 0;
  let day: number | undefined;

  for (let i = 0; i < candles.length; i++) {
    const candle = candles[i];
    const candleDay = utcDay(candle.timestamp);
    if (candleDay !== day) {
      cumTpVolume = 0;
      cumVolume = 0;
      day = candleDay;
    }
    cumTpVolume += typicalPrice(candle) * candle.volume;
    cumVolume += candle.volume;
    result[i] = vwapOf(cumTpVolume, cumVolume) ?? Number.NaN;
  }

  return result;
}

export class SessionVWAPStream extends IndicatorStream<readonly Candle[], Candle, number> {
  private cumTpVolume = 0;
  private cumVolume = 0;
  private day: number | undefined;

  constructor() {
    super("SessionVWAP");
  }

  protected update(candle: Candle): number | undefined {
    const candleDay = utcDay(candle.timestamp);
    if (candleDay !== this.day) {
      this.cumTpVolume = 0;
      this.cumVolume = 0;
      this.day = candleDay;
    }
    this.cumTpVolume += typicalPrice(candle) * candle.volume;
    this.cumVolume += candle.volume;
    return vwapOf(this.cumTpVolume, this.cumVolume);
  }

  protected clear(): void {
    this.cumTpVolume = 0;
    this.cumVolume = 0;
    this.day = undefined;
  }

  protected items(candles: readonly Candle[]): readonly Candle[] {
    return candles;
  }

  protected sentinel(): number {
    return Number.NaN;
  }

  /** Volume accumulated in the current session */
  cumulativeVolume(): number {
    return this.cumVolume;
  }

  cumulativeTpVolume(): number {
    return this.cumTpVolume;
  }
}

// ============================================
// Rolling VWAP
// ============================================

export const RollingVWAPParamsSchema = z.object({ period: periodSchema() });
export type RollingVWAPParams = z.infer<typeof RollingVWAPParamsSchema>;

export const ROLLING_VWAP_DEFAULTS: RollingVWAPParams = {
  period: 20,
};

/**
 * Rolling VWAP over the last `period` candles; NaN before index period - 1.
 */
export function calculateRollingVWAP(
  candles: readonly Candle[],
  params: RollingVWAPParams = ROLLING_VWAP_DEFAULTS
): number[] {
  const { period } = parseParams("RollingVWAP", RollingVWAPParamsSchema, params);
  const result = new Array<number>(candles.length).fill(Number.NaN);

  let sumTpVolume = 0;
  let sumVolume = 0;
  for (let i = 0; i < candles.length; i++) {
    const candle = candles[i];
    sumTpVolume += typicalPrice(candle) * candle.volume;
    sumVolume += candle.volume;
    if (i >= period) {
      const leaving = candles[i - period];
      sumTpVolume -= typicalPrice(leaving) * leaving.volume;
      sumVolume -= leaving.volume;
    }
    if (i >= period - 1) {
      result[i] = vwapOf(sumTpVolume, sumVolume) ?? Number.NaN;
    }
  }

  return result;
}

export class RollingVWAPStream extends IndicatorStream<readonly Candle[], Candle, number> {
  readonly period: number;
  private readonly tpVolume: RunningSum;
  private readonly volume: RunningSum;

  constructor(params: RollingVWAPParams = ROLLING_VWAP_DEFAULTS) {
    super("RollingVWAP");
    this.period = parseParams("RollingVWAP", RollingVWAPParamsSchema, params).period;
    this.tpVolume = new RunningSum(this.period);
    this.volume = new RunningSum(this.period);
  }

  protected update(candle: Candle): number | undefined {
    this.tpVolume.push(typicalPrice(candle) * candle.volume);
    this.volume.push(candle.volume);
    if (!this.volume.isFull()) {
      return undefined;
    }
    return vwapOf(this.tpVolume.sum, this.volume.sum);
  }

  protected clear(): void {
    this.tpVolume.clear();
    this.volume.clear();
  }

  protected items(candles: readonly Candle[]): readonly Candle[] {
    return candles;
  }

  protected sentinel(): number {
    return Number.NaN;
  }
}

// ============================================
// Anchored VWAP
// ============================================

const AnchorIndexSchema = z.object({
  anchorIndex: z.number().int("must be an integer").min(0, "must be at least 0"),
});

/**
 * Anchored VWAP from `anchorIndex` onward; NaN before the anchor.
 *
 * @throws InvalidParameterError when `anchorIndex` is not a non-negative integer
 */
export function calculateAnchoredVWAP(candles: readonly Candle[], anchorIndex: number): number[] {
  const { anchorIndex: start } = parseParams("AnchoredVWAP", AnchorIndexSchema, { anchorIndex });
  const result = new Array<number>(candles.length).fill(Number.NaN);
  let cumTpVolume = 0;
  let cumVolume = 0;

  for (let i = start; i < candles.length; i++) {
    const candle = candles[i];
    cumTpVolume += typicalPrice(candle) * candle.volume;
    cumVolume += candle.volume;
    result[i] = vwapOf(cumTpVolume, cumVolume) ?? Number.NaN;
  }

  return result;
}

/**
 * Anchored VWAP from the first candle whose timestamp reaches `anchorTimestamp`.
 *
 * @returns undefined when no candle reaches the anchor
 */
export function calculateAnchoredVWAPFromTimestamp(
  candles: readonly Candle[],
  anchorTimestamp: number
): number[] | undefined {
  const anchorIndex = candles.findIndex((candle) => candle.timestamp >= anchorTimestamp);
  if (anchorIndex === -1) {
    return undefined;
  }
  return calculateAnchoredVWAP(candles, anchorIndex);
}

export interface AnchoredVWAPOptions {
  /** Start accumulating at the first candle with timestamp >= this value */
  anchorTimestamp?: number;
}

/**
 * Streaming anchored VWAP.
 *
 * Without an anchor timestamp the next candle becomes the anchor. `init`
 * keeps the anchor and clears the accumulators; `reset` also drops the
 * anchor.
 */
export class AnchoredVWAPStream extends IndicatorStream<readonly Candle[], Candle, number> {
  private anchor: number | undefined;
  private anchored = false;
  private cumTpVolume = 0;
  private cumVolume = 0;

  constructor(options: AnchoredVWAPOptions = {}) {
    super("AnchoredVWAP");
    this.anchor = options.anchorTimestamp;
  }

  /**
   * Move the anchor and restart accumulation.
   */
  setAnchor(timestamp: number): void {
    this.anchor = timestamp;
    this.restart();
  }

  /**
   * Anchor at the next candle and restart accumulation.
   */
  anchorNow(): void {
    this.anchor = undefined;
    this.restart();
  }

  anchorTimestamp(): number | undefined {
    return this.anchor;
  }

  cumulativeVolume(): number {
    return this.cumVolume;
  }

  cumulativeTpVolume(): number {
    return this.cumTpVolume;
  }

  override init(candles: readonly Candle[]): number[] {
    this.restart();
    return this.replay(candles);
  }

  protected update(candle: Candle): number | undefined {
    if (!this.anchored) {
      if (this.anchor === undefined) {
        this.anchor = candle.timestamp;
      } else if (candle.timestamp < this.anchor) {
        return undefined;
      }
      this.anchored = true;
    }

    this.cumTpVolume += typicalPrice(candle) * candle.volume;
    this.cumVolume += candle.volume;
    return vwapOf(this.cumTpVolume, this.cumVolume);
  }

  protected clear(): void {
    this.anchor = undefined;
    this.restart();
  }

  protected items(candles: readonly Candle[]): readonly Candle[] {
    return candles;
  }

  protected sentinel(): number {
    return Number.NaN;
  }

  private restart(): void {
    this.anchored = false;
    this.cumTpVolume = 0;
    this.cumVolume = 0;
    this.forgetLast();
  }
}

export function rollingVwapRequiredPeriods(params: RollingVWAPParams = ROLLING_VWAP_DEFAULTS): number {
  return params.period;
}

export const sessionVwapCalculator: IndicatorCalculator<
  Record<string, never>,
  readonly Candle[],
  Candle,
  number
> = {
  name: "SessionVWAP",
  calculate: (candles) => calculateSessionVWAP(candles),
  requiredPeriods: () => 1,
  stream: () => new SessionVWAPStream(),
};

export const rollingVwapCalculator: IndicatorCalculator<RollingVWAPParams, readonly Candle[], Candle, number> = {
  name: "RollingVWAP",
  calculate: calculateRollingVWAP,
  requiredPeriods: rollingVwapRequiredPeriods,
  stream: (params) => new RollingVWAPStream(params),
};
