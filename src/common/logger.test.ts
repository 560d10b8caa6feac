import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  formatSimple,
  getLogger,
  LoggerEvents,
  LogLevel,
  parseLogLevel,
  StructuredLogger,
} from "./logger";

describe("StructuredLogger", () => {
  let lines: string[];
  const listener = (line: string) => lines.push(line);

  beforeEach(() => {
    lines = [];
    LoggerEvents.on("log", listener);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "debug").mockImplementation(() => undefined);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    LoggerEvents.off("log", listener);
    vi.restoreAllMocks();
  });

  it("writes context fields between message and level", () => {
    const logger = new StructuredLogger();
    logger.with().str("device", "Elm St").num("rows", 2).logger().info("Published");
    expect(lines).toEqual([
      '{"message":"Published","device":"Elm St","rows":2,"level":"info"}',
    ]);
    expect(console.info).toHaveBeenCalledWith(lines[0]);
  });

  it("drops messages below its level", () => {
    const logger = new StructuredLogger({ level: LogLevel.WARN });
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    expect(lines).toEqual(['{"message":"shown","level":"warn"}']);
  });

  it("does not leak context back into the parent", () => {
    const logger = new StructuredLogger();
    logger.with().str("device", "Elm St").logger().info("child");
    logger.info("parent");
    expect(lines[1]).toBe('{"message":"parent","level":"info"}');
  });

  it("records error codes and messages", () => {
    const err = Object.assign(new Error("boom"), { code: "http.status" });
    new StructuredLogger().with().error(err).logger().error("Fatal error");
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      message: "Fatal error",
      level: "error",
      error: { message: "boom", code: "http.status" },
    });
  });

  it("reports debug as enabled at trace level", () => {
    expect(new StructuredLogger({ level: LogLevel.TRACE }).isDebugEnabled()).toBe(
      true
    );
    expect(new StructuredLogger().isDebugEnabled()).toBe(false);
  });
});

describe("formatSimple", () => {
  it("colours the level and appends the context", () => {
    expect(
      formatSimple({ level: LogLevel.INFO, message: "hi", rows: 2 })
    ).toBe('\x1b[32mINFO\x1b[0m hi {"rows":2}');
  });
});

describe("getLogger", () => {
  it("reads the level from the environment", () => {
    expect(getLogger({ LOG_LEVEL: "DEBUG" }).getLevel()).toBe(LogLevel.DEBUG);
    expect(getLogger({}).getLevel()).toBe(LogLevel.INFO);
  });

  it("falls back to info for unknown levels", () => {
    expect(parseLogLevel("verbose")).toBe(LogLevel.INFO);
  });
});
