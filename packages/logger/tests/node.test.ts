import { describe, expect, it } from "vitest";
import { createNodeLogger, isLogLevel, mergeRedactPaths, withContext } from "../src/index";

function captureStream() {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    stream: {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  };
}

describe("createNodeLogger", () => {
  it("should write severity, service and ISO timestamp without pid or hostname", () => {
    const { lines, stream } = captureStream();
    const logger = createNodeLogger({
      service: "indicators",
      environment: "test",
      pretty: false,
      destination: stream,
    });

    logger.info({ bars: 3 }, "calculated");

    expect(lines).toHaveLength(1);
    const [line] = lines;
    expect(line.severity).toBe("INFO");
    expect(line.service).toBe("indicators");
    expect(line.environment).toBe("test");
    expect(line.bars).toBe(3);
    expect(line.msg).toBe("calculated");
    expect(typeof line.timestamp).toBe("string");
    expect(line.pid).toBeUndefined();
    expect(line.hostname).toBeUndefined();
  });

  it("should drop lines below the configured level", () => {
    const { lines, stream } = captureStream();
    const logger = createNodeLogger({
      service: "indicators",
      level: "warn",
      pretty: false,
      destination: stream,
    });

    logger.info("ignored");
    logger.warn("kept");

    expect(lines.map((line) => line.msg)).toEqual(["kept"]);
  });

  it("should redact default and custom paths", () => {
    const { lines, stream } = captureStream();
    const logger = createNodeLogger({
      service: "indicators",
      pretty: false,
      redactPaths: ["feed.accountId"],
      destination: stream,
    });

    logger.info({ password: "test-secret", feed: { accountId: "acct-1", symbol: "ABC" } }, "connect");

    expect(lines[0].password).toBe("[REDACTED]");
    expect(lines[0].feed).toEqual({ accountId: "[REDACTED]", symbol: "ABC" });
  });

  it("should stop writing after destroy", async () => {
    const { lines, stream } = captureStream();
    const logger = createNodeLogger({ service: "indicators", pretty: false, destination: stream });

    logger.info("before");
    await logger.destroy();
    logger.info("after");

    expect(lines.map((line) => line.msg)).toEqual(["before"]);
  });

  it("should silence children created before destroy", async () => {
    const { lines, stream } = captureStream();
    const logger = createNodeLogger({ service: "indicators", level: "debug", pretty: false, destination: stream });
    const child = withContext(logger, { timeframe: "4h" });

    child.debug("before");
    await logger.destroy();
    child.debug("after");
    child.child({ indicator: "rsi" }).error("after");

    expect(lines.map((line) => line.msg)).toEqual(["before"]);
    expect(lines[0].timeframe).toBe("4h");
  });
});

describe("withContext", () => {
  it("should bind defined values to a child logger", () => {
    const { lines, stream } = captureStream();
    const logger = createNodeLogger({ service: "indicators", pretty: false, destination: stream });

    withContext(logger, { timeframe: "1h", indicator: undefined }).info("snapshot");

    expect(lines[0].timeframe).toBe("1h");
    expect("indicator" in lines[0]).toBe(false);
  });
});

describe("helpers", () => {
  it("should deduplicate redact paths", () => {
    const paths = mergeRedactPaths(["password", "extra"]);
    expect(paths.filter((path) => path === "password")).toHaveLength(1);
    expect(paths).toContain("extra");
  });

  it("should recognise pino levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
