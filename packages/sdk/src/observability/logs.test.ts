import { describe, it, expect, afterEach, vi } from "vitest";
import { Logger, resolveLogLevel } from "./logs.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should route levels to matching console methods", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.info("resource.loaded");
    logger.warn("key.malformed");
    logger.error("resource.write_failed");

    expect(log).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should format section, key, path, message and details", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("info");

    logger.error("key.not_found", {
      section: "db",
      key: "user",
      path: "/tmp/app.ini",
      message: "lookup failed",
      details: { attempt: 1 },
    });

    const line = String(error.mock.calls[0]?.[0]);
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[ERROR\] \[key\.not_found\] /);
    expect(line.endsWith('db.user /tmp/app.ini lookup failed {"attempt":1}')).toBe(true);
  });

  it("should drop events below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.debug("resource.persisted");
    logger.info("resource.loaded");

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();

    logger.setLevel("debug");
    logger.debug("resource.persisted");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("should stay silent when disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("debug");

    logger.setEnabled(false);
    logger.error("resource.write_failed");

    expect(error).not.toHaveBeenCalled();
  });
});

describe("resolveLogLevel", () => {
  it("should default to info", () => {
    expect(resolveLogLevel({})).toBe("info");
  });

  it("should read INIKV_LOG_LEVEL case-insensitively", () => {
    expect(resolveLogLevel({ INIKV_LOG_LEVEL: "WARN" })).toBe("warn");
  });

  it("should ignore unknown levels", () => {
    expect(resolveLogLevel({ INIKV_LOG_LEVEL: "loud" })).toBe("info");
  });

  it("should force debug with INIKV_DEBUG=1", () => {
    expect(resolveLogLevel({ INIKV_DEBUG: "1", INIKV_LOG_LEVEL: "error" })).toBe("debug");
  });
});
