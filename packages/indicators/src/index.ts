/**
 * Technical Indicators Package
 *
 * Batch and streaming implementations of common technical analysis
 * indicators. Every indicator has a `calculate*` function over a whole
 * series and a stream class that takes one bar at a time and yields the
 * same values.
 *
 * @example
 * ```ts
 * import { calculateRSI, RSIStream, calculateIndicators } from '@tidemark/indicators';
 *
 * // Batch
 * const rsi = calculateRSI(closes, { period: 14 });
 *
 * // Streaming
 * const stream = new RSIStream({ period: 14 });
 * stream.init(history);
 * const latest = stream.next(price);
 *
 * // Every configured indicator for a timeframe
 * const snapshot = calculateIndicators(candles, '1h');
 * console.log(snapshot?.values['rsi_14_1h']);
 * ```
 */

// Incremental Primitives
export * from "./core/index";
// Errors
export * from "./errors";
// Parameter Schemas
export { MACDSignalType, PivotVariant, parseParams, periodSchema } from "./schemas";
// Momentum Indicators
export * from "./momentum/index";
// Trend Indicators
export * from "./trend/index";
// Volatility Indicators
export * from "./volatility/index";
// Volume Indicators
export * from "./volume/index";
// Types
export * from "./types";
// Pipeline Configuration
export * from "./config/index";
// Indicator Pipeline
export { bindIndicator, type CandleStream, type IndicatorBinding, paramLabel } from "./bindings";
export {
  calculateHistoricalIndicators,
  calculateIndicators,
  calculateMultiTimeframeIndicators,
  DEFAULT_PIPELINE_CONFIG,
  getRequiredWarmupPeriod,
  IndicatorStreamSet,
} from "./pipeline";
// Logger
export { log } from "./logger";
