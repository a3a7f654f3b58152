/**
 * FRVP (Fixed Range Volume Profile)
 *
 * Distributes the volume of a fixed set of bars across `bins` equal price
 * bins spanning [lowest low, highest high]. A bar's volume is spread over
 * the bins it overlaps in proportion to the overlap; a bar with no range
 * puts everything in its starting bin.
 *
 * Outputs:
 *   POC  - centre of the heaviest bin (lowest index wins ties)
 *   VAH/VAL - edges of the contiguous value area around the POC, grown one
 *             bin at a time toward the heavier neighbour (ties grow down)
 *             until it holds valueAreaPercent of the total volume
 *
 * @see https://www.tradingview.com/support/solutions/43000480324-fixed-range-volume-profile/
 */

import { z } from "zod";
import { InsufficientDataError, NotInitializedError } from "../errors";
import { parseParams } from "../schemas";
import type { Candle, VolumeProfileResult, VolumeProfileRow } from "../types";

export const FRVPParamsSchema = z.object({
  bins: z.number().int("must be an integer").min(1, "must be at least 1"),
  valueAreaPercent: z.number().min(0, "must be between 0 and 1").max(1, "must be between 0 and 1"),
});
export type FRVPParams = z.infer<typeof FRVPParamsSchema>;

export const FRVP_DEFAULTS: FRVPParams = {
  bins: 100,
  valueAreaPercent: 0.7,
};

/**
 * Grow the value area from the POC until it holds `target` volume.
 *
 * @returns inclusive [low, high] bin indices
 */
function valueAreaBounds(bins: readonly number[], pocIndex: number, target: number): [number, number] {
  let low = pocIndex;
  let high = pocIndex;
  let volume = bins[pocIndex];

  while (volume < target) {
    const canGrowDown = low > 0;
    const canGrowUp = high < bins.length - 1;
    if (!canGrowDown && !canGrowUp) {
      break;
    }
    const below = canGrowDown ? bins[low - 1] : 0;
    const above = canGrowUp ? bins[high + 1] : 0;
    if (canGrowDown && (below >= above || !canGrowUp)) {
      low--;
      volume += below;
    } else {
      high++;
      volume += above;
    }
  }

  return [low, high];
}

function binIndex(price: number, rangeLow: number, binSize: number, bins: number): number {
  return Math.min(bins - 1, Math.max(0, Math.floor((price - rangeLow) / binSize)));
}

/**
 * Build the volume profile for a fixed set of candles.
 *
 * @throws InsufficientDataError when `candles` is empty
 */
export function calculateFRVP(candles: readonly Candle[], params: FRVPParams = FRVP_DEFAULTS): VolumeProfileResult {
  const { bins, valueAreaPercent } = parseParams("FRVP", FRVPParamsSchema, params);
  if (candles.length === 0) {
    throw new InsufficientDataError("FRVP", 1, 0);
  }

  let rangeHigh = Number.NEGATIVE_INFINITY;
  let rangeLow = Number.POSITIVE_INFINITY;
  for (const candle of candles) {
    rangeHigh = Math.max(rangeHigh, candle.high);
    rangeLow = Math.min(rangeLow, candle.low);
  }

  // Flat range: a single row holding everything
  if (Math.abs(rangeHigh - rangeLow) < Number.EPSILON) {
    let totalVolume = 0;
    for (const candle of candles) {
      totalVolume += candle.volume;
    }
    return {
      poc: rangeHigh,
      vah: rangeHigh,
      val: rangeLow,
      totalVolume,
      pocVolume: totalVolume,
      valueAreaVolume: totalVolume,
      rangeHigh,
      rangeLow,
      histogram: [{ price: rangeHigh, volume: totalVolume, low: rangeLow, high: rangeHigh }],
    };
  }

  const binSize = (rangeHigh - rangeLow) / bins;
  const volumes = new Array<number>(bins).fill(0);

  for (const candle of candles) {
    if (candle.volume <= 0) {
      continue;
    }
    const start = binIndex(candle.low, rangeLow, binSize, bins);
    const end = binIndex(candle.high, rangeLow, binSize, bins);
    const candleRange = candle.high - candle.low;

    if (candleRange < Number.EPSILON) {
      volumes[start] += candle.volume;
      continue;
    }

    for (let bin = start; bin <= end; bin++) {
      const binLow = rangeLow + bin * binSize;
      const binHigh = binLow + binSize;
      const overlap = Math.max(0, Math.min(candle.high, binHigh) - Math.max(candle.low, binLow));
      volumes[bin] += candle.volume * (overlap / candleRange);
    }
  }

  let totalVolume = 0;
  let pocIndex = 0;
  let pocVolume = 0;
  for (let bin = 0; bin < bins; bin++) {
    totalVolume += volumes[bin];
    if (volumes[bin] > pocVolume) {
      pocVolume = volumes[bin];
      pocIndex = bin;
    }
  }

  const [valIndex, vahIndex] = valueAreaBounds(volumes, pocIndex, totalVolume * valueAreaPercent);
  let valueAreaVolume = 0;
  for (let bin = valIndex; bin <= vahIndex; bin++) {
    valueAreaVolume += volumes[bin];
  }

  const histogram: VolumeProfileRow[] = volumes.map((volume, bin) => {
    const low = rangeLow + bin * binSize;
    const high = low + binSize;
    return { price: (low + high) / 2, volume, low, high };
  });

  return {
    poc: rangeLow + (pocIndex + 0.5) * binSize,
    vah: rangeLow + (vahIndex + 1) * binSize,
    val: rangeLow + valIndex * binSize,
    totalVolume,
    pocVolume,
    valueAreaVolume,
    rangeHigh,
    rangeLow,
    histogram,
  };
}

/**
 * Streaming FRVP.
 *
 * Keeps every appended candle and rebuilds the profile on each `next`, so
 * memory grows with the number of candles until `reset`.
 */
export class FRVPStream {
  readonly params: FRVPParams;
  private candles: Candle[] = [];
  private last: VolumeProfileResult | undefined;

  constructor(params: FRVPParams = FRVP_DEFAULTS) {
    this.params = parseParams("FRVP", FRVPParamsSchema, params);
  }

  /**
   * Replace the stored candles.
   *
   * @returns [profile], or [] for empty input
   */
  init(candles: readonly Candle[]): VolumeProfileResult[] {
    this.candles = [...candles];
    this.last = undefined;
    if (this.candles.length === 0) {
      return [];
    }
    this.last = calculateFRVP(this.candles, this.params);
    return [this.last];
  }

  next(candle: Candle): VolumeProfileResult {
    this.candles.push(candle);
    this.last = calculateFRVP(this.candles, this.params);
    return this.last;
  }

  reset(): void {
    this.candles = [];
    this.last = undefined;
  }

  isReady(): boolean {
    return this.last !== undefined;
  }

  current(): VolumeProfileResult {
    if (this.last === undefined) {
      throw new NotInitializedError("FRVP");
    }
    return this.last;
  }

  candleCount(): number {
    return this.candles.length;
  }
}
