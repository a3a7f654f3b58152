/**
 * Trend Indicators
 *
 * Moving averages, MACD, Ichimoku and pivot levels.
 */

export {
  calculateSMA,
  calculateSMAFrom,
  smaRequiredPeriods,
  smaCalculator,
  calculateMultipleSMAs,
  isGoldenCross,
  isDeathCross,
  SMAStream,
  SMAParamsSchema,
  type SMAParams,
  SMA_DEFAULTS,
  SMA_PERIODS,
} from "./sma";

export {
  calculateEMA,
  emaMultiplier,
  emaRequiredPeriods,
  emaCalculator,
  calculateMultipleEMAs,
  EMAStream,
  EMAParamsSchema,
  type EMAParams,
  EMA_DEFAULTS,
  EMA_PERIODS,
} from "./ema";

export {
  calculateWMA,
  wmaRequiredPeriods,
  wmaCalculator,
  WMAStream,
  WMAParamsSchema,
  type WMAParams,
  WMA_DEFAULTS,
} from "./wma";

export {
  calculateHMA,
  hmaRequiredPeriods,
  hmaCalculator,
  HMAStream,
  HMAParamsSchema,
  type HMAParams,
  HMA_DEFAULTS,
} from "./hma";

export {
  calculateMACD,
  macdRequiredPeriods,
  macdCalculator,
  isMACDBullishCrossover,
  isMACDBearishCrossover,
  MACDStream,
  MACDParamsSchema,
  type MACDParams,
  MACD_DEFAULTS,
} from "./macd";

export {
  calculateIchimoku,
  ichimokuRequiredPeriods,
  ichimokuCalculator,
  isAboveCloud,
  IchimokuStream,
  IchimokuParamsSchema,
  type IchimokuParams,
  ICHIMOKU_DEFAULTS,
} from "./ichimoku";

export {
  pivotPoints,
  calculatePivotPoints,
  pivotPointsRequiredPeriods,
  pivotPointsCalculator,
  PivotPointsStream,
  PivotPointsParamsSchema,
  type PivotPointsParams,
  PIVOT_DEFAULTS,
} from "./pivotPoints";
