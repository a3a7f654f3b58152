import pino, { type Logger, type LoggerOptions } from "pino";
import { mergeRedactPaths } from "./redaction";
import type { LogContext, NodeLoggerOptions } from "./types";

type LoggerState = "active" | "flushing" | "destroyed";

/** Shared with every child through the logMethod hook */
interface Lifecycle {
  state: LoggerState;
}

export interface LifecycleLogger extends Logger {
  flush(): Promise<void>;
  destroy(): Promise<void>;
}

const FLUSH_GRACE_MS = 100;

function wrapLoggerWithLifecycle(baseLogger: Logger, lifecycle: Lifecycle): LifecycleLogger {
  let flushPromise: Promise<void> | null = null;
  const pinoFlush = baseLogger.flush.bind(baseLogger);

  const flush = async (): Promise<void> => {
    if (lifecycle.state === "destroyed") {
      return;
    }
    if (flushPromise) {
      return flushPromise;
    }
    lifecycle.state = "flushing";
    flushPromise = new Promise<void>((resolve) => {
      pinoFlush();
      // pino flushes asynchronously through sonic-boom/thread-stream
      setTimeout(() => {
        lifecycle.state = "active";
        flushPromise = null;
        resolve();
      }, FLUSH_GRACE_MS);
    });
    return flushPromise;
  };

  const destroy = async (): Promise<void> => {
    if (lifecycle.state === "destroyed") {
      return;
    }
    await flush();
    lifecycle.state = "destroyed";
    baseLogger.level = "silent";
  };

  return Object.assign(baseLogger, { flush, destroy });
}

export function createNodeLogger(options: NodeLoggerOptions): LifecycleLogger {
  const {
    service,
    level = "info",
    environment,
    version,
    pretty,
    redactPaths,
    base = {},
    pinoOptions = {},
    destination,
  } = options;

  const isPretty = pretty ?? process.env.NODE_ENV === "development";
  const lifecycle: Lifecycle = { state: "active" };

  const loggerOptions: LoggerOptions = {
    level,
    formatters: {
      level: (label) => ({ severity: label.toUpperCase() }),
      bindings: () => ({}), // Remove pid, hostname
    },
    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    redact: {
      paths: mergeRedactPaths(redactPaths),
      censor: "[REDACTED]",
    },
    // Children inherit hooks, so destroy() silences loggers created from this one
    hooks: {
      logMethod(inputArgs, method) {
        if (lifecycle.state !== "destroyed") {
          method.apply(this, inputArgs);
        }
      },
    },
    base: {
      service,
      environment,
      version,
      ...base,
    },
    ...pinoOptions,
  };

  let baseLogger: Logger;

  if (isPretty) {
    baseLogger = pino(
      loggerOptions,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,environment,version",
          customColors: "trace:gray,debug:gray,info:gray,warn:yellow,error:red,fatal:red",
          singleLine: true,
        },
      })
    );
  } else if (destination) {
    baseLogger = pino(loggerOptions, destination);
  } else {
    baseLogger = pino(loggerOptions);
  }

  return wrapLoggerWithLifecycle(baseLogger, lifecycle);
}

export function withContext(logger: Logger, context: LogContext): Logger {
  const bindings: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      bindings[key] = value;
    }
  }
  return logger.child(bindings);
}
