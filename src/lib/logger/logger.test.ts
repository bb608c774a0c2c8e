import { afterEach, describe, expect, it, vi } from "vitest";

// Mock config before importing logger
vi.mock("../config", () => ({
  getLoggingConfig: () => ({
    level: "debug",
    nodeEnv: "test",
  }),
}));

import { createLogger, logger } from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should log info messages", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("test message");
    expect(consoleSpy).toHaveBeenCalled();
  });

  it("should log error messages with the error details", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("test error", new Error("boom"));

    const line = String(consoleSpy.mock.calls[0]?.[0]);
    const entry: unknown = JSON.parse(line);
    expect(entry).toMatchObject({
      level: "error",
      message: "test error",
      error: { name: "Error", message: "boom" },
    });
  });

  it("should include the error cause", () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("wrapped", new Error("outer", { cause: new TypeError("inner") }));

    const entry: unknown = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ error: { cause: "TypeError: inner" } });
  });

  it("should include context in logs", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    logger.info("test message", { foo: "bar" });
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining('"foo":"bar"'));
  });

  it("should merge bindings into the context", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const bound = createLogger({ level: "debug", bindings: { exchange: "coinbase" } });
    bound.debug("retrying", { attempt: 1 });

    const entry: unknown = JSON.parse(String(consoleSpy.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ context: { exchange: "coinbase", attempt: 1 } });
  });

  it("should drop entries below the configured level", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    const quiet = createLogger({ level: "warn" });

    quiet.debug("hidden");
    quiet.info("hidden");
    quiet.warn("shown");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });
});
