/**
 * Vitest Global Setup
 *
 * Keeps LOGFAN_* variables from the shell out of the tests and starts every
 * test without a shared logger.
 */
import { beforeEach } from "vitest";
import { LOGGING_ENV_VARS } from "./packages/core/src/config/logging.config.js";

for (const name of LOGGING_ENV_VARS) {
  delete process.env[name];
}

// Loaded inside the hook so test files' vi.mock calls apply to the logger modules.
beforeEach(async () => {
  const { resetSharedLogger } = await import("./packages/core/src/logger/factory.js");
  resetSharedLogger();
});
