import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createConsoleLogger,
  isLogger,
  isLogLevel,
  resolveLogLevel,
  silentLogger,
} from "./logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("resolveLogLevel", () => {
    it("prefers an explicit level", () => {
      expect(
        resolveLogLevel("debug", { env: { GRAPHWIRE_LOG_LEVEL: "error" } }),
      ).toBe("debug");
    });

    it("reads GRAPHWIRE_LOG_LEVEL case-insensitively", () => {
      expect(
        resolveLogLevel(undefined, { env: { GRAPHWIRE_LOG_LEVEL: " Info " } }),
      ).toBe("info");
    });

    it("falls back to the environment default", () => {
      expect(resolveLogLevel(undefined, { env: {}, isDev: true })).toBe("warn");
      expect(resolveLogLevel(undefined, { env: {}, isDev: false })).toBe(
        "error",
      );
      expect(
        resolveLogLevel(undefined, {
          env: { GRAPHWIRE_LOG_LEVEL: "verbose" },
          nodeEnv: "production",
        }),
      ).toBe("error");
    });
  });

  describe("createConsoleLogger", () => {
    it("prefixes messages and forwards details", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const logger = createConsoleLogger({ level: "warn", name: "checkout" });
      const detail = { key: "payments" };

      logger.warn("Binding replaced.", detail);

      expect(warn).toHaveBeenCalledWith(
        "[graphwire:checkout] Binding replaced.",
        detail,
      );
    });

    it("drops messages below the threshold", () => {
      const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createConsoleLogger({ level: "error" });

      logger.debug("noise");
      logger.error("failure");

      expect(debug).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledWith("[graphwire] failure");
    });

    it("stays quiet at the silent level", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      createConsoleLogger({ level: "silent" }).error("ignored");
      expect(error).not.toHaveBeenCalled();
    });
  });

  it("recognizes levels and logger shapes", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogger(silentLogger)).toBe(true);
    expect(isLogger({ warn: () => undefined })).toBe(false);
    expect(isLogger(null)).toBe(false);
  });
});
