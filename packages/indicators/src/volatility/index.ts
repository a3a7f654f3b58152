/**
 * Volatility Indicators
 *
 * Band, range and regression-channel indicators.
 */

export {
  calculateBollingerBands,
  bollingerBands,
  bollingerRequiredPeriods,
  bollingerCalculator,
  isTouchingUpperBand,
  isTouchingLowerBand,
  isBollingerSqueeze,
  getBollingerSignal,
  BollingerBandsStream,
  BollingerBandsParamsSchema,
  type BollingerBandsParams,
  BOLLINGER_DEFAULTS,
} from "./bollinger";

export {
  calculateATR,
  calculateATRStop,
  atrRequiredPeriods,
  atrCalculator,
  ATRStream,
  ATRParamsSchema,
  type ATRParams,
  ATR_DEFAULTS,
} from "./atr";

export {
  calculateLinearRegression,
  regressWindow,
  linearRegressionRequiredPeriods,
  linearRegressionCalculator,
  LinearRegressionStream,
  LinearRegressionParamsSchema,
  type LinearRegressionParams,
  LINEAR_REGRESSION_DEFAULTS,
} from "./linearRegression";
