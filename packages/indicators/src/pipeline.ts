/**
 * Indicator Pipeline Orchestrator
 *
 * Coordinates calculation of multiple indicators across multiple timeframes.
 * Produces named output in format: {indicator}[_{field}]_{params}_{timeframe}
 */

import { type CandleStream, bindIndicator, type IndicatorBinding } from "./bindings";
import { type PipelineConfig, PipelineConfigSchema } from "./config/schema";
import { log } from "./logger";
import type { Candle, IndicatorSnapshot, NamedIndicatorOutput, Timeframe } from "./types";

// ============================================
// Configuration
// ============================================

const DEFAULT_TIMEFRAMES: Timeframe[] = ["1h", "4h", "1d"];

/**
 * Default pipeline configuration.
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = PipelineConfigSchema.parse({
  indicators: [
    { name: "rsi", timeframes: DEFAULT_TIMEFRAMES },
    { name: "stochastic", timeframes: DEFAULT_TIMEFRAMES },
    { name: "sma", params: { period: 20 }, timeframes: DEFAULT_TIMEFRAMES },
    { name: "sma", params: { period: 50 }, timeframes: DEFAULT_TIMEFRAMES },
    { name: "sma", params: { period: 200 }, timeframes: DEFAULT_TIMEFRAMES },
    { name: "ema", params: { period: 9 }, timeframes: DEFAULT_TIMEFRAMES },
    { name: "ema", params: { period: 21 }, timeframes: DEFAULT_TIMEFRAMES },
    { name: "macd", timeframes: DEFAULT_TIMEFRAMES },
    { name: "atr", timeframes: DEFAULT_TIMEFRAMES },
    { name: "bollinger", timeframes: DEFAULT_TIMEFRAMES },
    { name: "vwap_session", timeframes: ["1m", "5m", "15m", "1h"] },
  ],
});

// ============================================
// Helpers
// ============================================

function toNullable(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

function bindingsFor(config: PipelineConfig, timeframe: Timeframe): IndicatorBinding[] {
  return config.indicators
    .filter((indicator) => indicator.timeframes.includes(timeframe))
    .map((indicator) => bindIndicator(indicator));
}

function writeValues(output: NamedIndicatorOutput, keys: readonly string[], values: readonly number[] | null): void {
  keys.forEach((key, i) => {
    output[key] = values === null ? null : toNullable(values[i]);
  });
}

function reportFailure(binding: IndicatorBinding, timeframe: Timeframe, error: unknown): void {
  log.warn(
    {
      indicator: binding.config.name,
      timeframe,
      error: error instanceof Error ? error.message : String(error),
    },
    "Indicator calculation failed"
  );
}

// ============================================
// Batch Pipeline
// ============================================

/**
 * Calculate all configured indicators for a single timeframe.
 *
 * @param candles - OHLCV data for this timeframe (oldest first)
 * @param timeframe - Timeframe identifier (e.g., "1h", "4h", "1d")
 * @param config - Pipeline configuration
 * @returns Latest value of every indicator, or null for empty input
 */
export function calculateIndicators(
  candles: readonly Candle[],
  timeframe: Timeframe,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): IndicatorSnapshot | null {
  if (candles.length === 0) {
    return null;
  }

  const output: NamedIndicatorOutput = {};
  const latestCandle = candles[candles.length - 1];

  for (const binding of bindingsFor(config, timeframe)) {
    const keys = binding.keys(timeframe);
    try {
      writeValues(output, keys, binding.latest(candles));
    } catch (error) {
      reportFailure(binding, timeframe, error);
      writeValues(output, keys, null);
    }
  }

  log.debug({ timeframe, candles: candles.length, values: Object.keys(output).length }, "Calculated indicators");

  return {
    timestamp: latestCandle.timestamp,
    values: output,
  };
}

/**
 * Calculate indicators for several timeframes and merge the outputs.
 *
 * @param candlesByTimeframe - Candles for each timeframe
 * @param config - Pipeline configuration
 * @returns Combined snapshot stamped with the latest candle time, or null
 */
export function calculateMultiTimeframeIndicators(
  candlesByTimeframe: ReadonlyMap<Timeframe, readonly Candle[]>,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): IndicatorSnapshot | null {
  const combinedOutput: NamedIndicatorOutput = {};
  let latestTimestamp = 0;

  for (const [timeframe, candles] of candlesByTimeframe) {
    const snapshot = calculateIndicators(candles, timeframe, config);
    if (snapshot) {
      Object.assign(combinedOutput, snapshot.values);
      if (snapshot.timestamp > latestTimestamp) {
        latestTimestamp = snapshot.timestamp;
      }
    }
  }

  if (Object.keys(combinedOutput).length === 0) {
    return null;
  }

  return {
    timestamp: latestTimestamp,
    values: combinedOutput,
  };
}

/**
 * Get the number of candles needed before every configured indicator
 * produces a value, optionally only those bound to `timeframe`.
 */
export function getRequiredWarmupPeriod(
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  timeframe?: Timeframe
): number {
  let maxPeriod = 0;
  for (const indicator of config.indicators) {
    if (timeframe !== undefined && !indicator.timeframes.includes(timeframe)) {
      continue;
    }
    maxPeriod = Math.max(maxPeriod, bindIndicator(indicator).requiredPeriods());
  }
  return maxPeriod;
}

// ============================================
// Streaming Pipeline
// ============================================

interface StreamSlot {
  binding: IndicatorBinding;
  keys: string[];
  /** null once the stream has failed */
  stream: CandleStream | null;
}

/**
 * One stream per configured indicator for a single timeframe.
 *
 * Each `next` call produces the snapshot that `calculateIndicators` would
 * return for every candle seen so far. An indicator whose stream cannot be
 * created, or throws, reports null from then on.
 */
export class IndicatorStreamSet {
  private readonly slots: StreamSlot[];
  private count = 0;

  constructor(
    readonly timeframe: Timeframe,
    config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
  ) {
    this.slots = bindingsFor(config, timeframe).map((binding) => ({
      binding,
      keys: binding.keys(timeframe),
      stream: this.createStream(binding),
    }));
  }

  /**
   * Number of candles consumed since construction or the last reset.
   */
  get length(): number {
    return this.count;
  }

  next(candle: Candle): IndicatorSnapshot {
    const values: NamedIndicatorOutput = {};

    for (const slot of this.slots) {
      if (slot.stream === null) {
        writeValues(values, slot.keys, null);
        continue;
      }
      try {
        writeValues(values, slot.keys, slot.stream.next(candle));
      } catch (error) {
        reportFailure(slot.binding, this.timeframe, error);
        slot.stream = null;
        writeValues(values, slot.keys, null);
      }
    }

    this.count++;
    return { timestamp: candle.timestamp, values };
  }

  /**
   * Reset every stream and replay `candles`, returning one snapshot per candle.
   */
  init(candles: readonly Candle[]): IndicatorSnapshot[] {
    this.reset();
    return candles.map((candle) => this.next(candle));
  }

  reset(): void {
    for (const slot of this.slots) {
      if (slot.stream === null) {
        slot.stream = this.createStream(slot.binding);
      } else {
        slot.stream.reset();
      }
    }
    this.count = 0;
  }

  private createStream(binding: IndicatorBinding): CandleStream | null {
    try {
      return binding.stream();
    } catch (error) {
      reportFailure(binding, this.timeframe, error);
      return null;
    }
  }
}

/**
 * Calculate a snapshot for every candle from `startIndex` on (for backtesting).
 *
 * Runs the streaming pipeline once over the history, so each snapshot only
 * sees candles up to its own index.
 *
 * @param startIndex - First index to report; defaults to the warmup period
 * of the indicators bound to `timeframe`
 */
export function calculateHistoricalIndicators(
  candles: readonly Candle[],
  timeframe: Timeframe,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  startIndex = Math.max(0, getRequiredWarmupPeriod(config, timeframe) - 1)
): IndicatorSnapshot[] {
  const streams = new IndicatorStreamSet(timeframe, config);
  return streams.init(candles).slice(startIndex);
}
