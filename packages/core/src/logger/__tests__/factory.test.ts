import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLoggingConfig, testConfig } from "../../config/logging.config.js";
import { createMockStream } from "../destinations/__tests__/helpers.js";
import { createLogger, getSharedLogger, resetSharedLogger } from "../factory.js";
import { Logger } from "../logger.js";

describe("createLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "logfan-factory-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies settings from the config", () => {
    const logger = createLogger(testConfig);

    expect(logger.listDestinations()).toEqual([]);
    expect(logger.isHistoryEnabled()).toBe(true);
    expect(logger.isConcurrentDispatch()).toBe(false);
    expect(logger.getTimeFormat()).toBe("yyyy-MM-dd HH:mm:ss.SSS");
  });

  it("adds console and file destinations", () => {
    const config = createLoggingConfig(
      {
        console: { enabled: true, level: "debug" },
        file: { enabled: true, directory: dir, fileName: "app", level: "warn", maxLines: 10, maxBytes: 0 },
      },
      "development"
    );

    const logger = createLogger(config, { stream: createMockStream(true) });

    expect(logger.listDestinations().map((destination) => destination.id)).toEqual(["console", "file"]);
    expect(logger.getDestination("file")?.minimumLevel).toBe("warn");
  });

  it("skips the console without a terminal", () => {
    const config = createLoggingConfig({ console: { enabled: true, level: "debug" } }, "development");

    const logger = createLogger(config, { stream: createMockStream(false) });

    expect(logger.hasDestination("console")).toBe(false);
  });

  it("starts disabled when the config says so", () => {
    const logger = createLogger(createLoggingConfig({ enabled: false }, "test"));

    expect(logger.isEnabled()).toBe(false);
  });
});

describe("shared logger", () => {
  afterEach(() => {
    resetSharedLogger();
  });

  it("returns the same instance until reset", () => {
    const first = getSharedLogger();

    expect(getSharedLogger()).toBe(first);
    resetSharedLogger();
    expect(getSharedLogger()).not.toBe(first);
  });

  it("can be replaced", () => {
    const custom = new Logger();

    resetSharedLogger(custom);

    expect(getSharedLogger()).toBe(custom);
  });
});
