/**
 * Pipeline Configuration Schema
 *
 * A pipeline is a list of indicator entries. Each entry names an indicator,
 * its parameters and the timeframes it runs on. Parameters left out of a
 * YAML file take the indicator's defaults.
 */

import { z } from "zod";
import { bindIndicator } from "../bindings";
import { ADX_DEFAULTS } from "../momentum/adx";
import { MFI_DEFAULTS } from "../momentum/mfi";
import { RSI_DEFAULTS } from "../momentum/rsi";
import { STOCH_RSI_DEFAULTS } from "../momentum/stochRsi";
import { STOCHASTIC_DEFAULTS } from "../momentum/stochastic";
import { MACDSignalType, PivotVariant, periodSchema } from "../schemas";
import { EMA_DEFAULTS } from "../trend/ema";
import { HMA_DEFAULTS } from "../trend/hma";
import { ICHIMOKU_DEFAULTS } from "../trend/ichimoku";
import { MACD_DEFAULTS } from "../trend/macd";
import { PIVOT_DEFAULTS } from "../trend/pivotPoints";
import { SMA_DEFAULTS } from "../trend/sma";
import { WMA_DEFAULTS } from "../trend/wma";
import { ATR_DEFAULTS } from "../volatility/atr";
import { BOLLINGER_DEFAULTS } from "../volatility/bollinger";
import { LINEAR_REGRESSION_DEFAULTS } from "../volatility/linearRegression";
import { FRVP_DEFAULTS } from "../volume/frvp";
import { ROLLING_VWAP_DEFAULTS } from "../volume/vwap";

// ============================================
// Shared Pieces
// ============================================

export const TimeframeSchema = z.enum(["1m", "5m", "15m", "30m", "1h", "4h", "1d", "1w"]);

const timeframes = z.array(TimeframeSchema).min(1, "at least one timeframe is required").default(["1h"]);

const singlePeriod = (fallback: number) => z.object({ period: periodSchema().default(fallback) }).default({});

const noParams = z.object({}).strict().default({});

// ============================================
// Indicator Entries
// ============================================

const SMAConfigSchema = z.object({ name: z.literal("sma"), params: singlePeriod(SMA_DEFAULTS.period), timeframes });

const EMAConfigSchema = z.object({
  name: z.literal("ema"),
  params: z
    .object({
      period: periodSchema().default(EMA_DEFAULTS.period),
      multiplier: z.number().gt(0, "must be in range (0, 1]").lte(1, "must be in range (0, 1]").optional(),
    })
    .default({}),
  timeframes,
});

const WMAConfigSchema = z.object({ name: z.literal("wma"), params: singlePeriod(WMA_DEFAULTS.period), timeframes });

const HMAConfigSchema = z.object({
  name: z.literal("hma"),
  params: z
    .object({ period: z.number().int("must be an integer").min(2, "must be at least 2").default(HMA_DEFAULTS.period) })
    .default({}),
  timeframes,
});

const MACDConfigSchema = z.object({
  name: z.literal("macd"),
  params: z
    .object({
      fastPeriod: periodSchema().default(MACD_DEFAULTS.fastPeriod),
      slowPeriod: periodSchema().default(MACD_DEFAULTS.slowPeriod),
      signalPeriod: periodSchema().default(MACD_DEFAULTS.signalPeriod),
      signalType: MACDSignalType.default("ema"),
    })
    .refine((p) => p.fastPeriod < p.slowPeriod, { message: "fastPeriod must be less than slowPeriod" })
    .default({}),
  timeframes,
});

const IchimokuConfigSchema = z.object({
  name: z.literal("ichimoku"),
  params: z
    .object({
      tenkanPeriod: periodSchema().default(ICHIMOKU_DEFAULTS.tenkanPeriod),
      kijunPeriod: periodSchema().default(ICHIMOKU_DEFAULTS.kijunPeriod),
      senkouBPeriod: periodSchema().default(ICHIMOKU_DEFAULTS.senkouBPeriod),
    })
    .default({}),
  timeframes,
});

const PivotConfigSchema = z.object({
  name: z.literal("pivot"),
  params: z.object({ variant: PivotVariant.default(PIVOT_DEFAULTS.variant) }).default({}),
  timeframes,
});

const RSIConfigSchema = z.object({ name: z.literal("rsi"), params: singlePeriod(RSI_DEFAULTS.period), timeframes });

const StochasticConfigSchema = z.object({
  name: z.literal("stochastic"),
  params: z
    .object({
      kPeriod: periodSchema().default(STOCHASTIC_DEFAULTS.kPeriod),
      dPeriod: periodSchema().default(STOCHASTIC_DEFAULTS.dPeriod),
      slowing: periodSchema().default(3),
      slow: z.boolean().default(true),
    })
    .default({}),
  timeframes,
});

const StochRSIConfigSchema = z.object({
  name: z.literal("stoch_rsi"),
  params: z
    .object({
      rsiPeriod: periodSchema().default(STOCH_RSI_DEFAULTS.rsiPeriod),
      stochPeriod: periodSchema().default(STOCH_RSI_DEFAULTS.stochPeriod),
      kSmooth: periodSchema().default(STOCH_RSI_DEFAULTS.kSmooth),
      dPeriod: periodSchema().default(STOCH_RSI_DEFAULTS.dPeriod),
    })
    .default({}),
  timeframes,
});

const MFIConfigSchema = z.object({ name: z.literal("mfi"), params: singlePeriod(MFI_DEFAULTS.period), timeframes });

const ADXConfigSchema = z.object({ name: z.literal("adx"), params: singlePeriod(ADX_DEFAULTS.period), timeframes });

const BollingerConfigSchema = z.object({
  name: z.literal("bollinger"),
  params: z
    .object({
      period: periodSchema().default(BOLLINGER_DEFAULTS.period),
      stdDev: z
        .number()
        .positive("must be a positive finite number")
        .finite("must be a positive finite number")
        .default(BOLLINGER_DEFAULTS.stdDev),
    })
    .default({}),
  timeframes,
});

const ATRConfigSchema = z.object({ name: z.literal("atr"), params: singlePeriod(ATR_DEFAULTS.period), timeframes });

const LinRegConfigSchema = z.object({
  name: z.literal("linreg"),
  params: z
    .object({
      period: z
        .number()
        .int("must be an integer")
        .min(2, "must be at least 2 for regression")
        .default(LINEAR_REGRESSION_DEFAULTS.period),
      multiplier: z
        .number()
        .min(0, "must be non-negative")
        .finite("must be finite")
        .default(LINEAR_REGRESSION_DEFAULTS.multiplier),
    })
    .default({}),
  timeframes,
});

const SessionVWAPConfigSchema = z.object({ name: z.literal("vwap_session"), params: noParams, timeframes });

const RollingVWAPConfigSchema = z.object({
  name: z.literal("vwap_rolling"),
  params: singlePeriod(ROLLING_VWAP_DEFAULTS.period),
  timeframes,
});

const CVDConfigSchema = z.object({ name: z.literal("cvd"), params: noParams, timeframes });

const FRVPConfigSchema = z.object({
  name: z.literal("frvp"),
  params: z
    .object({
      bins: z.number().int("must be an integer").min(1, "must be at least 1").default(FRVP_DEFAULTS.bins),
      valueAreaPercent: z
        .number()
        .min(0, "must be between 0 and 1")
        .max(1, "must be between 0 and 1")
        .default(FRVP_DEFAULTS.valueAreaPercent),
    })
    .default({}),
  timeframes,
});

/**
 * One configured indicator, discriminated by `name`.
 */
export const IndicatorConfigSchema = z.discriminatedUnion("name", [
  SMAConfigSchema,
  EMAConfigSchema,
  WMAConfigSchema,
  HMAConfigSchema,
  MACDConfigSchema,
  IchimokuConfigSchema,
  PivotConfigSchema,
  RSIConfigSchema,
  StochasticConfigSchema,
  StochRSIConfigSchema,
  MFIConfigSchema,
  ADXConfigSchema,
  BollingerConfigSchema,
  ATRConfigSchema,
  LinRegConfigSchema,
  SessionVWAPConfigSchema,
  RollingVWAPConfigSchema,
  CVDConfigSchema,
  FRVPConfigSchema,
]);
export type IndicatorConfig = z.infer<typeof IndicatorConfigSchema>;
export type IndicatorConfigInput = z.input<typeof IndicatorConfigSchema>;
export type IndicatorName = IndicatorConfig["name"];

/**
 * Complete pipeline configuration.
 *
 * Two entries may not produce the same snapshot key on a shared timeframe.
 */
export const PipelineConfigSchema = z
  .object({
    indicators: z.array(IndicatorConfigSchema),
  })
  .superRefine((config, ctx) => {
    const owners = new Map<string, number>();
    config.indicators.forEach((indicator, index) => {
      const binding = bindIndicator(indicator);
      const keys = indicator.timeframes.flatMap((timeframe) => binding.keys(timeframe));
      const clash = keys.find((key) => owners.has(key));
      if (clash !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["indicators", index],
          message: `produces key ${clash} already produced by indicators.${owners.get(clash)}`,
        });
        return;
      }
      for (const key of keys) {
        owners.set(key, index);
      }
    });
  });
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

// ============================================
// Validation
// ============================================

export interface ValidationResult {
  success: boolean;
  data?: PipelineConfig;
  errors: string[];
}

/**
 * Validate a raw pipeline configuration object.
 */
export function validatePipelineConfig(config: unknown): ValidationResult {
  const result = PipelineConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data, errors: [] };
  }

  return {
    success: false,
    errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
  };
}
