import { trace } from "@opentelemetry/api";
import { shortCode, type LogLevel } from "../levels.js";
import type { Destination, LogEntry } from "../types.js";
import { type LineStream, writeLine } from "./stream.js";
import { DestinationBaseSchema, parseDestinationOptions, validateDestinationId } from "./validation.js";

/**
 * Options for TraceDestination.
 */
export interface TraceDestinationOptions {
  /** Unique identifier */
  id: string;
  /** Minimum level (default: 'debug') */
  minimumLevel?: LogLevel;
  /** Start disabled when false (default: true) */
  enabled?: boolean;
  /** Diagnostic stream (default: process.stderr) */
  stream?: LineStream;
}

/**
 * Writes each formatted line to the diagnostic stream and, inside an active
 * OpenTelemetry span, records it as a `log` span event.
 *
 * Unlike ConsoleDestination this works without a terminal.
 */
export class TraceDestination implements Destination {
  readonly id: string;
  minimumLevel: LogLevel;
  enabled: boolean;
  private readonly stream: LineStream;

  constructor(options: TraceDestinationOptions) {
    validateDestinationId(options.id);
    const parsed = parseDestinationOptions(DestinationBaseSchema, options, "trace");

    this.id = parsed.id;
    this.minimumLevel = parsed.minimumLevel ?? "debug";
    this.enabled = parsed.enabled ?? true;
    this.stream = options.stream ?? process.stderr;
  }

  async write(entry: LogEntry): Promise<void> {
    trace.getActiveSpan()?.addEvent("log", {
      "log.severity": shortCode(entry.level),
      "log.message": entry.body,
    });
    await writeLine(this.stream, entry.line);
  }
}
