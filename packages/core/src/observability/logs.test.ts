import { describe, it, expect, vi, afterEach } from "vitest";
import { formatEntry, logger } from "./logs.js";

describe("formatEntry", () => {
  it("should render every part on one line", () => {
    const line = formatEntry({
      timestamp: "2024-01-01T00:00:00.000Z",
      level: "info",
      event: "index.build",
      index: "users",
      message: "built",
      details: { records: 3 },
    });

    expect(line).toBe('[2024-01-01T00:00:00.000Z] [INFO] [index.build] users built {"records":3}');
  });

  it("should skip missing parts", () => {
    expect(formatEntry({ timestamp: "t", level: "warn", event: "e" })).toBe("[t] [WARN] [e]");
  });
});

describe("logger", () => {
  afterEach(() => {
    logger.setDebug(undefined);
    logger.setEnabled(true);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("should route levels to console methods", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.warn("index.warn");
    logger.error("index.error");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/\[WARN\] \[index\.warn\]$/);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should only print debug output when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    vi.stubEnv("RECORD_INDEX_DEBUG", "0");
    logger.debug("index.build");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("RECORD_INDEX_DEBUG", "1");
    logger.debug("index.build");
    expect(debug).toHaveBeenCalledTimes(1);

    logger.setDebug(false);
    logger.debug("index.build");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("should print nothing when disabled", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.setEnabled(false);
    logger.info("index.info");

    expect(log).not.toHaveBeenCalled();
  });
});
