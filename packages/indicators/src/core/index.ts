/**
 * Incremental building blocks reused across indicators.
 */

export { RingBuffer } from "./ringBuffer";
export { RunningMoments, RunningSum } from "./runningSum";
export { type DequeMode, MonotonicDeque } from "./monotonicDeque";
export { type WilderSeed, WilderSmoother } from "./wilder";
export { IndicatorStream } from "./stream";
export {
  candlesFromArrays,
  closes,
  hlcBars,
  hlcvBars,
  medianPrice,
  toHlcSeries,
  toHlcvSeries,
  trueRange,
  typicalPrice,
} from "./series";
