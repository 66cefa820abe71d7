import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, LogLevel, createCorrelatedLogger } from "./logger";

const silence = (method: "info" | "debug" | "error") =>
  vi.spyOn(console, method).mockImplementation(() => undefined);

const lastEntry = (spy: { mock: { calls: unknown[][] } }): Record<string, unknown> => {
  const calls = spy.mock.calls;
  const output = calls[calls.length - 1][0];
  if (typeof output !== "string") {
    throw new Error("expected a JSON log line");
  }
  return JSON.parse(output);
};

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write one JSON line with service, level and context", () => {
    const infoSpy = silence("info");
    new Logger("TestService", {}, LogLevel.DEBUG).info("hello", { count: 2 });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    expect(lastEntry(infoSpy)).toMatchObject({
      level: "INFO",
      service: "TestService",
      message: "hello",
      count: 2,
    });
  });

  it("should skip entries below the minimum level", () => {
    const debugSpy = silence("debug");
    const logger = new Logger("TestService", {}, LogLevel.INFO);
    logger.debug("hidden");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
    expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(true);
  });

  it("should merge child context and keep the level", () => {
    const debugSpy = silence("debug");
    const child = new Logger("TestService", { a: 1 }, LogLevel.DEBUG).child({ b: 2 });
    child.debug("nested");

    expect(lastEntry(debugSpy)).toMatchObject({ a: 1, b: 2, message: "nested" });
  });

  it("should include error details", () => {
    const errorSpy = silence("error");
    new Logger("TestService", {}, LogLevel.DEBUG).error("failed", new TypeError("bad value"));

    expect(lastEntry(errorSpy)).toMatchObject({
      level: "ERROR",
      message: "failed",
      error: { name: "TypeError", message: "bad value" },
    });
  });

  it("should write bigint values as strings", () => {
    const infoSpy = silence("info");
    new Logger("TestService", {}, LogLevel.DEBUG).info("big", { size: 5n });

    expect(lastEntry(infoSpy)).toMatchObject({ size: "5" });
  });

  it("should still log when the context cannot be serialized", () => {
    const infoSpy = silence("info");
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    new Logger("TestService", {}, LogLevel.DEBUG).info("loop", { circular });

    const entry = lastEntry(infoSpy);
    expect(entry.message).toBe("loop");
    expect(entry).toHaveProperty("contextError");
    expect(entry).not.toHaveProperty("circular");
  });

  it("should attach the correlation id", () => {
    const errorSpy = silence("error");
    createCorrelatedLogger("test-correlation-id", { operation: "write" }).error("boom");

    expect(lastEntry(errorSpy)).toMatchObject({
      service: "FeatureFormatter",
      correlationId: "test-correlation-id",
      operation: "write",
    });
  });
});
