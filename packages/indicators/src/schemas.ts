/**
 * Parameter Validation
 *
 * Each indicator declares a zod schema for its parameters. Parsing happens
 * once, at stream construction or at the start of a batch call.
 */

import { z } from "zod";
import { InvalidParameterError, formatZodIssues } from "./errors";

/** Window length: a positive integer */
export const periodSchema = () => z.number().int("must be an integer").min(1, "must be greater than 0");

export const PivotVariant = z.enum(["standard", "fibonacci", "woodie"]);
export type PivotVariant = z.infer<typeof PivotVariant>;

export const MACDSignalType = z.enum(["ema", "sma"]);
export type MACDSignalType = z.infer<typeof MACDSignalType>;

/**
 * Validate parameters against a schema, raising InvalidParameterError.
 */
export function parseParams<S extends z.ZodTypeAny>(indicator: string, schema: S, params: unknown): z.output<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    throw new InvalidParameterError(indicator, formatZodIssues(result.error));
  }
  return result.data;
}
