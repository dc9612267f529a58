import { ErrorCode } from "@logfan/shared";
import { trace } from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../../../errors/types.js";
import { ConsoleDestination } from "../console.js";
import { TraceDestination } from "../trace.js";
import { createMockStream, makeEntry } from "./helpers.js";

describe("ConsoleDestination", () => {
  it("writes the formatted line verbatim", async () => {
    const stream = createMockStream(true);
    const destination = new ConsoleDestination({ id: "console", stream });

    await destination.write(makeEntry("debug", "hello"));

    expect(stream.chunks).toEqual(["2026-10-19 08:05:03.042 [DBG] hello\n"]);
  });

  it("defaults to debug", () => {
    const destination = new ConsoleDestination({ id: "console", stream: createMockStream(true) });

    expect(destination.minimumLevel).toBe("debug");
  });

  it("refuses a non-interactive stream", () => {
    const create = () => new ConsoleDestination({ id: "console", stream: createMockStream(false) });

    let caught: unknown;
    try {
      create();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: ErrorCode.NON_INTERACTIVE });
  });

  it("rejects when the stream reports an error", async () => {
    const destination = new ConsoleDestination({
      id: "console",
      stream: createMockStream(true, new Error("EPIPE")),
    });

    await expect(destination.write(makeEntry("info", "x"))).rejects.toThrow("EPIPE");
  });
});

describe("TraceDestination", () => {
  it("writes to a non-interactive stream", async () => {
    const stream = createMockStream(false);
    const destination = new TraceDestination({ id: "trace", stream, minimumLevel: "warn" });

    await destination.write(makeEntry("error", "oops"));

    expect(destination.minimumLevel).toBe("warn");
    expect(stream.chunks).toEqual(["2026-10-19 08:05:03.042 [ERR] oops\n"]);
  });

  describe("inside a span", () => {
    let provider: NodeTracerProvider;

    beforeEach(() => {
      provider = new NodeTracerProvider();
      provider.register();
    });

    afterEach(async () => {
      await provider.shutdown();
    });

    it("records a span event", async () => {
      const destination = new TraceDestination({ id: "trace", stream: createMockStream(false) });
      const tracer = trace.getTracer("test-tracer");

      await tracer.startActiveSpan("request", async (span) => {
        const addEvent = vi.spyOn(span, "addEvent");

        await destination.write(makeEntry("warn", "slow query"));

        expect(addEvent).toHaveBeenCalledWith("log", {
          "log.severity": "WRN",
          "log.message": "slow query",
        });
        span.end();
      });
    });
  });
});
