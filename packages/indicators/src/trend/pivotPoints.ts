/**
 * Pivot Points
 *
 * Support and resistance levels derived from a bar's high, low and close.
 * Stateless: each bar is transformed independently.
 *
 * Standard:   P = (H + L + C) / 3
 *             R1 = 2P - L, S1 = 2P - H
 *             R2 = P + (H - L), S2 = P - (H - L)
 *             R3 = H + 2(P - L), S3 = L - 2(H - P)
 * Woodie:     P = (H + L + 2C) / 4, levels as Standard
 * Fibonacci:  P = (H + L + C) / 3
 *             R/S1 = P ± 0.382(H - L), R/S2 = P ± 0.618(H - L), R/S3 = P ± (H - L)
 *
 * @see https://www.investopedia.com/terms/p/pivotpoint.asp
 */

import { z } from "zod";
import { hlcBars } from "../core/series";
import { IndicatorStream } from "../core/stream";
import { parseParams, PivotVariant } from "../schemas";
import type { HlcBar, HlcSeries, IndicatorCalculator, PivotPointsResult } from "../types";

export const PivotPointsParamsSchema = z.object({ variant: PivotVariant });
export type PivotPointsParams = z.infer<typeof PivotPointsParamsSchema>;

export const PIVOT_DEFAULTS: PivotPointsParams = {
  variant: "standard",
};

function emptyPivots(): PivotPointsResult {
  return {
    pivot: Number.NaN,
    r1: Number.NaN,
    r2: Number.NaN,
    r3: Number.NaN,
    s1: Number.NaN,
    s2: Number.NaN,
    s3: Number.NaN,
  };
}

/**
 * Pivot levels for a single bar. Any NaN input yields an all-NaN record.
 */
export function pivotPoints(bar: HlcBar, variant: PivotVariant = "standard"): PivotPointsResult {
  const { high, low, close } = bar;
  if (Number.isNaN(high) || Number.isNaN(low) || Number.isNaN(close)) {
    return emptyPivots();
  }

  const range = high - low;

  if (variant === "fibonacci") {
    const pivot = (high + low + close) / 3;
    return {
      pivot,
      r1: pivot + 0.382 * range,
      r2: pivot + 0.618 * range,
      r3: pivot + range,
      s1: pivot - 0.382 * range,
      s2: pivot - 0.618 * range,
      s3: pivot - range,
    };
  }

  const pivot = variant === "woodie" ? (high + low + 2 * close) / 4 : (high + low + close) / 3;
  return {
    pivot,
    r1: 2 * pivot - low,
    r2: pivot + range,
    r3: high + 2 * (pivot - low),
    s1: 2 * pivot - high,
    s2: pivot - range,
    s3: low - 2 * (high - pivot),
  };
}

/**
 * Calculate pivot levels for every bar.
 *
 * @throws InvalidParameterError when high, low and close lengths differ
 */
export function calculatePivotPoints(
  series: HlcSeries,
  params: PivotPointsParams = PIVOT_DEFAULTS
): PivotPointsResult[] {
  const { variant } = parseParams("PivotPoints", PivotPointsParamsSchema, params);
  return hlcBars("PivotPoints", series).map((bar) => pivotPoints(bar, variant));
}

/**
 * Stream form for pipelines that feed bars one at a time.
 */
export class PivotPointsStream extends IndicatorStream<HlcSeries, HlcBar, PivotPointsResult> {
  readonly variant: PivotVariant;

  constructor(params: PivotPointsParams = PIVOT_DEFAULTS) {
    super("PivotPoints");
    this.variant = parseParams("PivotPoints", PivotPointsParamsSchema, params).variant;
  }

  protected update(bar: HlcBar): PivotPointsResult {
    return pivotPoints(bar, this.variant);
  }

  protected clear(): void {
    // stateless
  }

  protected items(series: HlcSeries): readonly HlcBar[] {
    return hlcBars(this.name, series);
  }

  protected sentinel(): PivotPointsResult {
    return emptyPivots();
  }
}

export function pivotPointsRequiredPeriods(): number {
  return 1;
}

export const pivotPointsCalculator: IndicatorCalculator<PivotPointsParams, HlcSeries, HlcBar, PivotPointsResult> = {
  name: "PivotPoints",
  calculate: calculatePivotPoints,
  requiredPeriods: pivotPointsRequiredPeriods,
  stream: (params) => new PivotPointsStream(params),
};

export default pivotPointsCalculator;
