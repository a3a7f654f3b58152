/**
 * Technical Indicator Types
 *
 * Common types and interfaces shared by the batch and streaming
 * indicator implementations.
 */

// ============================================
// Candle Data Types
// ============================================

/**
 * OHLCV candle data for indicator calculations.
 */
export interface Candle {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  /** Opening price */
  open: number;
  /** Highest price */
  high: number;
  /** Lowest price */
  low: number;
  /** Closing price */
  close: number;
  /** Volume traded */
  volume: number;
}

/**
 * Single bar for indicators that only read high, low and close.
 */
export interface HlcBar {
  high: number;
  low: number;
  close: number;
}

export interface HlcvBar extends HlcBar {
  volume: number;
}

/**
 * Parallel high/low/close arrays. All three must have the same length.
 */
export interface HlcSeries {
  high: readonly number[];
  low: readonly number[];
  close: readonly number[];
}

export interface HlcvSeries extends HlcSeries {
  volume: readonly number[];
}

/**
 * Timeframe identifier.
 */
export type Timeframe = "1m" | "5m" | "15m" | "30m" | "1h" | "4h" | "1d" | "1w";

// ============================================
// Indicator Result Types
// ============================================
//
// Absent values are NaN. A record in the warmup region has every
// numeric field set to NaN.

export interface MACDResult {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerBandsResult {
  upper: number;
  middle: number;
  lower: number;
  /** Position within the bands, 0.5 when the bands collapse */
  percentB: number;
  /** (upper - lower) / middle, 0 when middle is 0 */
  bandwidth: number;
}

/**
 * Stochastic and Stochastic RSI result with %K and %D.
 */
export interface StochasticResult {
  k: number;
  d: number;
}

export interface IchimokuResult {
  tenkan: number;
  kijun: number;
  senkouA: number;
  senkouB: number;
  /** Current close; the consumer applies the backward shift */
  chikou: number;
}

export interface ADXResult {
  adx: number;
  plusDi: number;
  minusDi: number;
}

export interface LinearRegressionResult {
  /** Regression value at the last bar of the window */
  value: number;
  upper: number;
  lower: number;
  slope: number;
  /** Pearson correlation coefficient */
  r: number;
  rSquared: number;
}

export interface PivotPointsResult {
  pivot: number;
  r1: number;
  r2: number;
  r3: number;
  s1: number;
  s2: number;
  s3: number;
}

export interface VolumeProfileRow {
  /** Bin centre */
  price: number;
  volume: number;
  low: number;
  high: number;
}

export interface VolumeProfileResult {
  /** Point of control: centre of the heaviest bin */
  poc: number;
  /** Value area high */
  vah: number;
  /** Value area low */
  val: number;
  totalVolume: number;
  pocVolume: number;
  valueAreaVolume: number;
  rangeHigh: number;
  rangeLow: number;
  histogram: VolumeProfileRow[];
}

// ============================================
// Indicator Contract
// ============================================

/**
 * Stateful, incremental form of an indicator.
 *
 * `init` resets and replays a prefix, returning exactly what the batch
 * function returns for the same input. `next` yields `undefined` while
 * the indicator is still warming up.
 */
export interface StreamingIndicator<TInput, TItem, TOutput> {
  init(input: TInput): TOutput[];
  next(item: TItem): TOutput | undefined;
  reset(): void;
  isReady(): boolean;
}

/**
 * Batch calculation plus a stream factory for one indicator.
 */
export interface IndicatorCalculator<TParams, TInput, TItem, TOutput> {
  readonly name: string;
  calculate(input: TInput, params?: TParams): TOutput[];
  /** Inputs needed before the first non-sentinel output */
  requiredPeriods(params?: TParams): number;
  stream(params?: TParams): StreamingIndicator<TInput, TItem, TOutput>;
}

// ============================================
// Pipeline Output Types
// ============================================

/**
 * Named indicator output (e.g., "rsi_14_1h", "sma_20_4h").
 */
export type NamedIndicatorOutput = Record<string, number | null>;

/**
 * Multi-indicator snapshot at a single point in time.
 */
export interface IndicatorSnapshot {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  /** Named indicator values */
  values: NamedIndicatorOutput;
}
