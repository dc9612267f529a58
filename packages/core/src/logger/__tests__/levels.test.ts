import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors/types.js";
import {
  category,
  isAtLeast,
  isLogLevel,
  LOG_LEVELS,
  levelLabel,
  parseLogLevel,
  rank,
  shortCode,
} from "../levels.js";

describe("levels", () => {
  it("orders levels from debug to critical", () => {
    expect(LOG_LEVELS.map(rank)).toEqual([0, 1, 2, 3, 4]);
  });

  it("maps every level to its three-letter code", () => {
    expect(LOG_LEVELS.map(shortCode)).toEqual(["DBG", "INF", "WRN", "ERR", "CRT"]);
  });

  it("maps levels to coarse categories", () => {
    expect(category("debug")).toBe("informational");
    expect(category("info")).toBe("informational");
    expect(category("warn")).toBe("warning");
    expect(category("error")).toBe("error");
    expect(category("critical")).toBe("error");
  });

  it("labels levels for display", () => {
    expect(levelLabel("warn")).toBe("Warn");
    expect(levelLabel("critical")).toBe("Critical");
  });

  describe("isAtLeast", () => {
    it("admits the minimum itself", () => {
      expect(isAtLeast("warn", "warn")).toBe(true);
    });

    it("admits higher levels and rejects lower ones", () => {
      expect(isAtLeast("critical", "info")).toBe(true);
      expect(isAtLeast("debug", "info")).toBe(false);
    });
  });

  describe("parseLogLevel", () => {
    it("accepts names in any case", () => {
      expect(parseLogLevel("WARN")).toBe("warn");
      expect(parseLogLevel(" Critical ")).toBe("critical");
    });

    it("accepts short codes", () => {
      expect(parseLogLevel("dbg")).toBe("debug");
      expect(parseLogLevel("ERR")).toBe("error");
    });

    it("rejects unknown names", () => {
      expect(() => parseLogLevel("verbose")).toThrow(ConfigurationError);
      expect(() => parseLogLevel("verbose")).toThrow('Unknown log level "verbose"');
    });
  });

  it("recognises level names", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("INFO")).toBe(false);
    expect(isLogLevel("trace")).toBe(false);
  });
});
