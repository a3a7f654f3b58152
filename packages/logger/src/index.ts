import pino from "pino";

export { createNodeLogger, type LifecycleLogger, withContext } from "./node";
export * from "./redaction";
export * from "./types";

export { pino };
