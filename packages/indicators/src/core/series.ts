/**
 * Bar and series helpers shared by the OHLC and OHLCV indicators.
 */

import { assertSameLength } from "../errors";
import type { Candle, HlcBar, HlcSeries, HlcvBar, HlcvSeries } from "../types";

/** (high + low + close) / 3 */
export function typicalPrice(bar: HlcBar): number {
  return (bar.high + bar.low + bar.close) / 3;
}

/** (high + low) / 2 */
export function medianPrice(bar: Pick<HlcBar, "high" | "low">): number {
  return (bar.high + bar.low) / 2;
}

/**
 * True range of a bar. Without a previous close it is the bar's own range.
 */
export function trueRange(bar: HlcBar, prevClose?: number): number {
  const range = bar.high - bar.low;
  if (prevClose === undefined) {
    return range;
  }
  return Math.max(range, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
}

/**
 * Zip parallel high/low/close arrays into bars.
 *
 * @throws InvalidParameterError when the lengths differ
 */
export function hlcBars(indicator: string, series: HlcSeries): HlcBar[] {
  const length = assertSameLength(indicator, {
    high: series.high,
    low: series.low,
    close: series.close,
  });
  const bars = new Array<HlcBar>(length);
  for (let i = 0; i < length; i++) {
    bars[i] = { high: series.high[i], low: series.low[i], close: series.close[i] };
  }
  return bars;
}

export function hlcvBars(indicator: string, series: HlcvSeries): HlcvBar[] {
  const length = assertSameLength(indicator, {
    high: series.high,
    low: series.low,
    close: series.close,
    volume: series.volume,
  });
  const bars = new Array<HlcvBar>(length);
  for (let i = 0; i < length; i++) {
    bars[i] = {
      high: series.high[i],
      low: series.low[i],
      close: series.close[i],
      volume: series.volume[i],
    };
  }
  return bars;
}

/**
 * Build candles from six parallel arrays.
 *
 * @throws InvalidParameterError when the lengths differ
 */
export function candlesFromArrays(
  timestamp: readonly number[],
  open: readonly number[],
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  volume: readonly number[]
): Candle[] {
  const length = assertSameLength("Candle", { timestamp, open, high, low, close, volume });
  const candles = new Array<Candle>(length);
  for (let i = 0; i < length; i++) {
    candles[i] = {
      timestamp: timestamp[i],
      open: open[i],
      high: high[i],
      low: low[i],
      close: close[i],
      volume: volume[i],
    };
  }
  return candles;
}

export function toHlcSeries(candles: readonly Candle[]): HlcSeries {
  return {
    high: candles.map((c) => c.high),
    low: candles.map((c) => c.low),
    close: candles.map((c) => c.close),
  };
}

export function toHlcvSeries(candles: readonly Candle[]): HlcvSeries {
  return { ...toHlcSeries(candles), volume: candles.map((c) => c.volume) };
}

export function closes(candles: readonly Candle[]): number[] {
  return candles.map((c) => c.close);
}
