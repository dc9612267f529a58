import { ErrorCode } from "@logfan/shared";
import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  isConfigurationError,
  isWriteFailure,
  LogfanError,
  WriteFailure,
} from "../types.js";

describe("LogfanError", () => {
  it("carries code, context and cause", () => {
    const cause = new Error("root");
    const error = new LogfanError("failed", ErrorCode.WRITE_FAILED, { cause, context: { id: "db" } });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("LogfanError");
    expect(error.code).toBe(ErrorCode.WRITE_FAILED);
    expect(error.context).toEqual({ id: "db" });
    expect(error.cause).toBe(cause);
  });

  it("serializes to JSON with the cause message", () => {
    const error = new LogfanError("failed", ErrorCode.WRITE_FAILED, { cause: new Error("root") });

    expect(error.toJSON()).toEqual({
      name: "LogfanError",
      message: "failed",
      code: ErrorCode.WRITE_FAILED,
      context: undefined,
      cause: "root",
    });
  });
});

describe("ConfigurationError", () => {
  it("defaults to CONFIG_INVALID", () => {
    const error = new ConfigurationError("bad");

    expect(error.name).toBe("ConfigurationError");
    expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
    expect(isConfigurationError(error)).toBe(true);
  });

  it("recognises configuration codes on the base class", () => {
    expect(isConfigurationError(new LogfanError("x", ErrorCode.INVALID_IDENTIFIER))).toBe(true);
    expect(isConfigurationError(new LogfanError("x", ErrorCode.WRITE_FAILED))).toBe(false);
    expect(isConfigurationError(new Error("x"))).toBe(false);
  });
});

describe("WriteFailure", () => {
  it("wraps an error with the destination id", () => {
    const cause = new Error("socket hang up");
    const failure = WriteFailure.from(cause, "smtp");

    expect(failure.message).toBe("socket hang up");
    expect(failure.destinationId).toBe("smtp");
    expect(failure.cause).toBe(cause);
    expect(failure.timedOut).toBe(false);
    expect(isWriteFailure(failure)).toBe(true);
  });

  it("returns an existing failure unchanged", () => {
    const failure = new WriteFailure("late", { timedOut: true });

    expect(WriteFailure.from(failure, "other")).toBe(failure);
    expect(failure.code).toBe(ErrorCode.WRITE_TIMEOUT);
  });

  it("stringifies non-error values", () => {
    expect(WriteFailure.from(404).message).toBe("404");
  });
});
