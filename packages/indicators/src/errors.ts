/**
 * Indicator Errors
 *
 * Every failure raised by the library is an IndicatorError. The `kind`
 * discriminant lets callers switch without instanceof chains.
 */

import type { ZodError } from "zod";

export type IndicatorErrorKind = "invalid_parameter" | "insufficient_data" | "not_initialized";

/**
 * Indicator calculation error.
 */
export class IndicatorError extends Error {
  constructor(
    public readonly indicator: string,
    public readonly kind: IndicatorErrorKind,
    message: string
  ) {
    super(`[${indicator}] ${message}`);
    this.name = "IndicatorError";
  }
}

/**
 * A parameter violates its domain, or parallel input arrays differ in length.
 */
export class InvalidParameterError extends IndicatorError {
  constructor(
    indicator: string,
    public readonly reason: string
  ) {
    super(indicator, "invalid_parameter", reason);
    this.name = "InvalidParameterError";
  }
}

/**
 * The input cannot produce a meaningful result (only FRVP on empty input).
 */
export class InsufficientDataError extends IndicatorError {
  constructor(
    indicator: string,
    public readonly required: number,
    public readonly provided: number
  ) {
    super(indicator, "insufficient_data", `Insufficient data: need ${required}, got ${provided}`);
    this.name = "InsufficientDataError";
  }
}

/**
 * A stream was queried before it produced any value.
 */
export class NotInitializedError extends IndicatorError {
  constructor(indicator: string) {
    super(indicator, "not_initialized", "stream has not produced a value yet");
    this.name = "NotInitializedError";
  }
}

export function isIndicatorError(error: unknown): error is IndicatorError {
  return error instanceof IndicatorError;
}

/**
 * Flatten zod issues into "path: message" fragments joined by "; ".
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Throw InvalidParameterError unless every named array has the same length.
 */
export function assertSameLength(indicator: string, arrays: Record<string, readonly unknown[]>): number {
  const entries = Object.entries(arrays);
  const expected = entries.length > 0 ? entries[0][1].length : 0;
  for (const [, values] of entries) {
    if (values.length !== expected) {
      const names = entries.map(([name]) => name);
      const listed = `${names.slice(0, -1).join(", ")}, and ${names[names.length - 1]}`;
      throw new InvalidParameterError(
        indicator,
        names.length === 2 ? `${names[0]} and ${names[1]} must have the same length` : `${listed} must have the same length`
      );
    }
  }
  return expected;
}
