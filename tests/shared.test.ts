import {
  DEFAULT_PATTERN_CACHE_SIZE,
  DEFAULT_REGEX_MATCH_TIMEOUT_MS,
  parsePositiveInt,
} from "../src/shared/config";
import { LogLevel, Logger } from "../src/shared/logger";

describe("Shared", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("parsePositiveInt()", () => {
    it("should parse positive integers", () => {
      expect(parsePositiveInt("64", DEFAULT_PATTERN_CACHE_SIZE)).toBe(64);
    });

    it("should fall back for missing or invalid values", () => {
      expect(parsePositiveInt(undefined, DEFAULT_PATTERN_CACHE_SIZE)).toBe(512);
      expect(parsePositiveInt("", DEFAULT_REGEX_MATCH_TIMEOUT_MS)).toBe(250);
      expect(parsePositiveInt("abc", DEFAULT_REGEX_MATCH_TIMEOUT_MS)).toBe(250);
      expect(parsePositiveInt("0", DEFAULT_REGEX_MATCH_TIMEOUT_MS)).toBe(250);
      expect(parsePositiveInt("-5", DEFAULT_REGEX_MATCH_TIMEOUT_MS)).toBe(250);
    });
  });

  describe("Logger", () => {
    it("should filter messages below the configured level", () => {
      const logger = new Logger("warn", false);

      expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.WARN)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
    });

    it("should default unknown levels to info", () => {
      const logger = new Logger("verbose", false);

      expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
    });

    it("should write JSON lines when enabled", () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      const logger = new Logger("info", true);

      logger.warn("Pattern match timed out", { pattern: "ecs:*" });

      expect(warn).toHaveBeenCalledTimes(1);
      const line = JSON.parse(String(warn.mock.calls[0][0]));
      expect(line.level).toBe("WARN");
      expect(line.message).toBe("Pattern match timed out");
      expect(line.pattern).toBe("ecs:*");
    });

    it("should log decisions at debug level only", () => {
      const debug = jest.spyOn(console, "debug").mockImplementation(() => undefined);

      new Logger("info", false).logDecision("condition", false);
      expect(debug).not.toHaveBeenCalled();

      new Logger("debug", true).logDecision("pattern", true, { candidate: "a" });
      expect(debug).toHaveBeenCalledTimes(1);
      const line = JSON.parse(String(debug.mock.calls[0][0]));
      expect(line).toMatchObject({
        level: "DEBUG",
        primitive: "pattern",
        outcome: true,
        candidate: "a",
      });
    });
  });
});
