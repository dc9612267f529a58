import { ErrorCode } from "@logfan/shared";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors/types.js";
import {
  createLoggingConfig,
  developmentConfig,
  getLoggingConfig,
  LOGGING_ENV_VARS,
  loadLoggingConfig,
  productionConfig,
  testConfig,
} from "../logging.config.js";

describe("getLoggingConfig", () => {
  it("selects the preset by name", () => {
    expect(getLoggingConfig("production")).toBe(productionConfig);
    expect(getLoggingConfig("test")).toBe(testConfig);
    expect(getLoggingConfig("staging")).toBe(developmentConfig);
  });
});

describe("createLoggingConfig", () => {
  it("merges nested sections over the preset", () => {
    const config = createLoggingConfig(
      { file: { enabled: true, level: "info", maxLines: 100, maxBytes: 0 } },
      "development"
    );

    expect(config.file).toEqual({ enabled: true, level: "info", maxLines: 100, maxBytes: 0 });
    expect(config.console).toEqual(developmentConfig.console);
  });
});

describe("loadLoggingConfig", () => {
  it("returns the preset when no variable is set", () => {
    expect(loadLoggingConfig({ NODE_ENV: "test" })).toEqual(testConfig);
  });

  it("applies LOGFAN_* variables over the preset", () => {
    const config = loadLoggingConfig({
      NODE_ENV: "development",
      LOGFAN_CONSOLE: "off",
      LOGFAN_LOG_DIR: "/var/log/billing",
      LOGFAN_FILE_LEVEL: "WRN",
      LOGFAN_MAX_LINES: "50000",
      LOGFAN_CONCURRENT: "0",
      LOGFAN_HISTORY: "200",
      LOGFAN_TIME_FORMAT: "HH:mm:ss",
    });

    expect(config).toEqual({
      enabled: true,
      concurrent: false,
      timeFormat: "HH:mm:ss",
      historyCapacity: 200,
      console: { enabled: false, level: "debug" },
      file: {
        enabled: true,
        directory: "/var/log/billing",
        level: "warn",
        maxLines: 50000,
        maxBytes: 0,
      },
    });
  });

  it("ignores empty variables", () => {
    expect(loadLoggingConfig({ NODE_ENV: "production", LOGFAN_ENABLED: "" }).enabled).toBe(true);
  });

  it("turns the file destination on for a file name alone", () => {
    const config = loadLoggingConfig({ NODE_ENV: "development", LOGFAN_LOG_FILE: "billing" });

    expect(config.file.enabled).toBe(true);
    expect(config.file.fileName).toBe("billing");
  });

  it("names every invalid variable", () => {
    let caught: unknown;
    try {
      loadLoggingConfig({ LOGFAN_ENABLED: "maybe", LOGFAN_CONSOLE_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toHaveProperty("code", ErrorCode.CONFIG_INVALID);
    expect(caught).toHaveProperty(
      "message",
      'Invalid logging environment: LOGFAN_ENABLED: expected a boolean, got "maybe"; ' +
        'LOGFAN_CONSOLE_LEVEL: unknown log level "loud"'
    );
  });

  it("rejects negative limits", () => {
    expect(() => loadLoggingConfig({ LOGFAN_MAX_BYTES: "-5" })).toThrow("LOGFAN_MAX_BYTES");
  });

  it("lists the variables it reads", () => {
    expect(LOGGING_ENV_VARS).toContain("LOGFAN_LOG_DIR");
    expect(LOGGING_ENV_VARS).toHaveLength(11);
  });
});
