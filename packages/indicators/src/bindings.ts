/**
 * Indicator Bindings
 *
 * Adapts each configured indicator to a candle feed: how to build its input
 * from candles, which output fields become snapshot keys, and how to run
 * it in batch or streaming form.
 */

import type { IndicatorConfig } from "./config/schema";
import { closes, toHlcSeries, toHlcvSeries } from "./core/series";
import { adxCalculator } from "./momentum/adx";
import { mfiCalculator } from "./momentum/mfi";
import { rsiCalculator } from "./momentum/rsi";
import { stochRsiCalculator } from "./momentum/stochRsi";
import { stochasticCalculator } from "./momentum/stochastic";
import { emaCalculator } from "./trend/ema";
import { hmaCalculator } from "./trend/hma";
import { ichimokuCalculator } from "./trend/ichimoku";
import { macdCalculator } from "./trend/macd";
import { pivotPointsCalculator } from "./trend/pivotPoints";
import { smaCalculator } from "./trend/sma";
import { wmaCalculator } from "./trend/wma";
import type {
  ADXResult,
  BollingerBandsResult,
  Candle,
  HlcBar,
  HlcSeries,
  HlcvBar,
  HlcvSeries,
  IchimokuResult,
  IndicatorCalculator,
  LinearRegressionResult,
  MACDResult,
  PivotPointsResult,
  StochasticResult,
  Timeframe,
  VolumeProfileResult,
} from "./types";
import { atrCalculator } from "./volatility/atr";
import { bollingerCalculator } from "./volatility/bollinger";
import { linearRegressionCalculator } from "./volatility/linearRegression";
import { cvdCalculator } from "./volume/cvd";
import { calculateFRVP, FRVPStream } from "./volume/frvp";
import { rollingVwapCalculator, sessionVwapCalculator } from "./volume/vwap";

// ============================================
// Types
// ============================================

/**
 * Per-candle stream for one configured indicator. Every call returns one
 * value per field, NaN while warming up.
 */
export interface CandleStream {
  next(candle: Candle): number[];
  reset(): void;
}

export interface IndicatorBinding {
  readonly config: IndicatorConfig;
  /** Output field suffixes; "" is the indicator's primary value */
  readonly fields: readonly string[];
  /** Snapshot keys for a timeframe, in field order */
  keys(timeframe: Timeframe): string[];
  requiredPeriods(): number;
  /** Latest value of every field for a candle history */
  latest(candles: readonly Candle[]): number[];
  stream(): CandleStream;
}

interface InputAdapter<TInput, TItem> {
  input(candles: readonly Candle[]): TInput;
  item(candle: Candle): TItem;
}

type Field<TOutput> = readonly [suffix: string, read: (output: TOutput) => number];

type Runner = Pick<IndicatorBinding, "requiredPeriods" | "latest" | "stream"> & { fields: readonly string[] };

// ============================================
// Adapters
// ============================================

const closeInput: InputAdapter<readonly number[], number> = {
  input: closes,
  item: (candle) => candle.close,
};

const hlcInput: InputAdapter<HlcSeries, HlcBar> = {
  input: toHlcSeries,
  item: (candle) => candle,
};

const hlcvInput: InputAdapter<HlcvSeries, HlcvBar> = {
  input: toHlcvSeries,
  item: (candle) => candle,
};

const candleInput: InputAdapter<readonly Candle[], Candle> = {
  input: (candles) => candles,
  item: (candle) => candle,
};

const scalar: readonly Field<number>[] = [["", (value) => value]];

function run<TParams, TInput, TItem, TOutput>(
  calculator: IndicatorCalculator<TParams, TInput, TItem, TOutput>,
  params: TParams,
  adapter: InputAdapter<TInput, TItem>,
  fields: readonly Field<TOutput>[]
): Runner {
  const read = (output: TOutput | undefined): number[] =>
    fields.map(([, pick]) => (output === undefined ? Number.NaN : pick(output)));

  return {
    fields: fields.map(([suffix]) => suffix),
    requiredPeriods: () => calculator.requiredPeriods(params),
    latest: (candles) => {
      const series = calculator.calculate(adapter.input(candles), params);
      return read(series.length > 0 ? series[series.length - 1] : undefined);
    },
    stream: () => {
      const stream = calculator.stream(params);
      return {
        next: (candle) => read(stream.next(adapter.item(candle))),
        reset: () => stream.reset(),
      };
    },
  };
}

// ============================================
// Field Tables
// ============================================

const macdFields: readonly Field<MACDResult>[] = [
  ["", (r) => r.macd],
  ["signal", (r) => r.signal],
  ["histogram", (r) => r.histogram],
];

const bollingerFields: readonly Field<BollingerBandsResult>[] = [
  ["upper", (r) => r.upper],
  ["middle", (r) => r.middle],
  ["lower", (r) => r.lower],
  ["percentb", (r) => r.percentB],
  ["bandwidth", (r) => r.bandwidth],
];

const stochasticFields: readonly Field<StochasticResult>[] = [
  ["k", (r) => r.k],
  ["d", (r) => r.d],
];

const adxFields: readonly Field<ADXResult>[] = [
  ["", (r) => r.adx],
  ["plus_di", (r) => r.plusDi],
  ["minus_di", (r) => r.minusDi],
];

const ichimokuFields: readonly Field<IchimokuResult>[] = [
  ["tenkan", (r) => r.tenkan],
  ["kijun", (r) => r.kijun],
  ["senkou_a", (r) => r.senkouA],
  ["senkou_b", (r) => r.senkouB],
  ["chikou", (r) => r.chikou],
];

const linearRegressionFields: readonly Field<LinearRegressionResult>[] = [
  ["", (r) => r.value],
  ["upper", (r) => r.upper],
  ["lower", (r) => r.lower],
  ["slope", (r) => r.slope],
  ["r", (r) => r.r],
  ["r_squared", (r) => r.rSquared],
];

const pivotFields: readonly Field<PivotPointsResult>[] = [
  ["", (r) => r.pivot],
  ["r1", (r) => r.r1],
  ["r2", (r) => r.r2],
  ["r3", (r) => r.r3],
  ["s1", (r) => r.s1],
  ["s2", (r) => r.s2],
  ["s3", (r) => r.s3],
];

const frvpFields: readonly Field<VolumeProfileResult>[] = [
  ["poc", (r) => r.poc],
  ["vah", (r) => r.vah],
  ["val", (r) => r.val],
];

function frvpRunner(params: { bins: number; valueAreaPercent: number }): Runner {
  const read = (profile: VolumeProfileResult): number[] => frvpFields.map(([, pick]) => pick(profile));
  return {
    fields: frvpFields.map(([suffix]) => suffix),
    requiredPeriods: () => 1,
    latest: (candles) => read(calculateFRVP(candles, params)),
    stream: () => {
      const stream = new FRVPStream(params);
      return {
        next: (candle) => read(stream.next(candle)),
        reset: () => stream.reset(),
      };
    },
  };
}

// ============================================
// Binding
// ============================================

/**
 * Parameter part of a snapshot key, e.g. "12_26_9" for MACD.
 *
 * Non-default variants get a suffix: "12_26_9_sma" for an SMA signal line,
 * "14_3_3_fast" for a fast stochastic, "21_m0.1" for an EMA with an
 * explicit multiplier.
 */
export function paramLabel(config: IndicatorConfig): string {
  switch (config.name) {
    case "ema":
      return config.params.multiplier === undefined
        ? `${config.params.period}`
        : `${config.params.period}_m${config.params.multiplier}`;
    case "macd": {
      const { fastPeriod, slowPeriod, signalPeriod, signalType } = config.params;
      const periods = `${fastPeriod}_${slowPeriod}_${signalPeriod}`;
      return signalType === "sma" ? `${periods}_sma` : periods;
    }
    case "ichimoku":
      return `${config.params.tenkanPeriod}_${config.params.kijunPeriod}_${config.params.senkouBPeriod}`;
    case "pivot":
      return config.params.variant;
    case "stochastic": {
      const { kPeriod, dPeriod, slowing, slow } = config.params;
      const periods = `${kPeriod}_${dPeriod}_${slowing}`;
      return slow ? periods : `${periods}_fast`;
    }
    case "stoch_rsi":
      return `${config.params.rsiPeriod}_${config.params.stochPeriod}_${config.params.kSmooth}_${config.params.dPeriod}`;
    case "bollinger":
      return `${config.params.period}_${config.params.stdDev}`;
    case "linreg":
      return `${config.params.period}_${config.params.multiplier}`;
    case "frvp":
      return `${config.params.bins}_${Math.round(config.params.valueAreaPercent * 100)}`;
    case "vwap_session":
    case "cvd":
      return "";
    default:
      return `${config.params.period}`;
  }
}

function runnerFor(config: IndicatorConfig): Runner {
  switch (config.name) {
    case "sma":
      return run(smaCalculator, config.params, closeInput, scalar);
    case "ema":
      return run(emaCalculator, config.params, closeInput, scalar);
    case "wma":
      return run(wmaCalculator, config.params, closeInput, scalar);
    case "hma":
      return run(hmaCalculator, config.params, closeInput, scalar);
    case "macd":
      return run(macdCalculator, config.params, closeInput, macdFields);
    case "ichimoku":
      return run(ichimokuCalculator, config.params, hlcInput, ichimokuFields);
    case "pivot":
      return run(pivotPointsCalculator, config.params, hlcInput, pivotFields);
    case "rsi":
      return run(rsiCalculator, config.params, closeInput, scalar);
    case "stochastic":
      return run(stochasticCalculator, config.params, hlcInput, stochasticFields);
    case "stoch_rsi":
      return run(stochRsiCalculator, config.params, closeInput, stochasticFields);
    case "mfi":
      return run(mfiCalculator, config.params, hlcvInput, scalar);
    case "adx":
      return run(adxCalculator, config.params, hlcInput, adxFields);
    case "bollinger":
      return run(bollingerCalculator, config.params, closeInput, bollingerFields);
    case "atr":
      return run(atrCalculator, config.params, hlcInput, scalar);
    case "linreg":
      return run(linearRegressionCalculator, config.params, closeInput, linearRegressionFields);
    case "vwap_session":
      return run(sessionVwapCalculator, {}, candleInput, scalar);
    case "vwap_rolling":
      return run(rollingVwapCalculator, config.params, candleInput, scalar);
    case "cvd":
      return run(cvdCalculator, {}, hlcvInput, scalar);
    case "frvp":
      return frvpRunner(config.params);
  }
}

/**
 * Build the binding for one configured indicator.
 *
 * Keys follow `{indicator}[_{field}][_{params}]_{timeframe}`, for example
 * `rsi_14_1h` or `macd_signal_12_26_9_4h`.
 */
export function bindIndicator(config: IndicatorConfig): IndicatorBinding {
  const runner = runnerFor(config);
  const label = paramLabel(config);

  return {
    config,
    fields: runner.fields,
    keys: (timeframe) =>
      runner.fields.map((field) => [config.name, field, label, timeframe].filter((part) => part !== "").join("_")),
    requiredPeriods: runner.requiredPeriods,
    latest: runner.latest,
    stream: runner.stream,
  };
}
