/**
 * Momentum Indicators
 *
 * Oscillators measuring the speed and strength of price moves.
 */

export {
  calculateRSI,
  rsiFromAverages,
  rsiRequiredPeriods,
  rsiCalculator,
  isOverbought,
  isOversold,
  RSIStream,
  RSIParamsSchema,
  type RSIParams,
  RSI_DEFAULTS,
  RSI_OVERBOUGHT,
  RSI_OVERSOLD,
} from "./rsi";

export {
  calculateStochastic,
  stochasticPosition,
  stochasticRequiredPeriods,
  stochasticCalculator,
  isStochasticOverbought,
  isStochasticOversold,
  isBullishCrossover,
  isBearishCrossover,
  StochasticStream,
  StochasticParamsSchema,
  type StochasticParams,
  STOCHASTIC_DEFAULTS,
  STOCHASTIC_OVERBOUGHT,
  STOCHASTIC_OVERSOLD,
} from "./stochastic";

export {
  calculateStochRSI,
  stochRsiRequiredPeriods,
  stochRsiCalculator,
  StochRSIStream,
  StochRSIParamsSchema,
  type StochRSIParams,
  STOCH_RSI_DEFAULTS,
} from "./stochRsi";

export {
  calculateMFI,
  mfiFromFlows,
  mfiRequiredPeriods,
  mfiCalculator,
  MFIStream,
  MFIParamsSchema,
  type MFIParams,
  MFI_DEFAULTS,
  MFI_OVERBOUGHT,
  MFI_OVERSOLD,
} from "./mfi";

export {
  calculateADX,
  directionalMove,
  adxRequiredPeriods,
  adxCalculator,
  isTrending,
  ADXStream,
  ADXParamsSchema,
  type ADXParams,
  ADX_DEFAULTS,
  ADX_TREND_THRESHOLD,
} from "./adx";
