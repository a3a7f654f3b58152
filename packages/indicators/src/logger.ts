import { createNodeLogger, isLogLevel, type LifecycleLogger } from "@tidemark/logger";

const level = process.env.LOG_LEVEL;

export const log: LifecycleLogger = createNodeLogger({
  service: "indicators",
  level: isLogLevel(level) ? level : "info",
  environment: process.env.TIDEMARK_ENV ?? "development",
  pretty: process.env.NODE_ENV === "development",
});
