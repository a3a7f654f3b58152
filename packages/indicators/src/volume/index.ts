/**
 * Volume Indicators
 *
 * Volume-weighted prices, order-flow delta and volume profile.
 */

export {
  calculateSessionVWAP,
  calculateRollingVWAP,
  calculateAnchoredVWAP,
  calculateAnchoredVWAPFromTimestamp,
  rollingVwapRequiredPeriods,
  sessionVwapCalculator,
  rollingVwapCalculator,
  utcDay,
  SessionVWAPStream,
  RollingVWAPStream,
  AnchoredVWAPStream,
  type AnchoredVWAPOptions,
  RollingVWAPParamsSchema,
  type RollingVWAPParams,
  ROLLING_VWAP_DEFAULTS,
  MS_PER_DAY,
} from "./vwap";

export { volumeDelta, calculateCVD, calculateCVDFromBars, cvdCalculator, CVDStream, BarCVDStream } from "./cvd";

export { calculateFRVP, FRVPStream, FRVPParamsSchema, type FRVPParams, FRVP_DEFAULTS } from "./frvp";
