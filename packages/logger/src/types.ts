import type { DestinationStream, LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export interface NodeLoggerOptions {
  /** Service name attached to every line */
  service: string;
  level?: LogLevel;
  /** Deployment environment label, e.g. "development" or "production" */
  environment?: string;
  version?: string;
  /** Pretty-print through pino-pretty. Defaults to NODE_ENV === "development" */
  pretty?: boolean;
  /** Extra paths to censor, merged with the defaults */
  redactPaths?: readonly string[];
  base?: Record<string, unknown>;
  pinoOptions?: Partial<LoggerOptions>;
  /** Write to this stream instead of stdout (ignored when pretty) */
  destination?: DestinationStream;
}

/**
 * Bindings attached to a child logger. Undefined entries are dropped.
 */
export type LogContext = Record<string, string | number | boolean | undefined>;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some((level) => level === value);
}
