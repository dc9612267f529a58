import { ErrorCode } from "@logfan/shared";
import { ConfigurationError } from "../../errors/types.js";
import type { LogLevel } from "../levels.js";
import type { Destination, LogEntry } from "../types.js";
import { type LineStream, writeLine } from "./stream.js";
import { DestinationBaseSchema, parseDestinationOptions, validateDestinationId } from "./validation.js";

/**
 * Options for ConsoleDestination.
 */
export interface ConsoleDestinationOptions {
  /** Unique identifier */
  id: string;
  /** Minimum level (default: 'debug') */
  minimumLevel?: LogLevel;
  /** Start disabled when false (default: true) */
  enabled?: boolean;
  /** Output stream (default: process.stdout) */
  stream?: LineStream;
}

/**
 * Writes each formatted line verbatim to an interactive terminal.
 *
 * Construction fails when the output is not a TTY (piped, redirected, or a
 * service without a console); use a FileDestination or TraceDestination there.
 *
 * @example
 * ```typescript
 * logger.addDestination(new ConsoleDestination({ id: 'console' }));
 * ```
 */
export class ConsoleDestination implements Destination {
  readonly id: string;
  minimumLevel: LogLevel;
  enabled: boolean;
  private readonly stream: LineStream;

  constructor(options: ConsoleDestinationOptions) {
    validateDestinationId(options.id);
    const parsed = parseDestinationOptions(DestinationBaseSchema, options, "console");
    const stream = options.stream ?? process.stdout;

    if (stream.isTTY !== true) {
      throw new ConfigurationError(
        "Console destination requires an interactive terminal",
        ErrorCode.NON_INTERACTIVE,
        { context: { id: parsed.id } }
      );
    }

    this.id = parsed.id;
    this.minimumLevel = parsed.minimumLevel ?? "debug";
    this.enabled = parsed.enabled ?? true;
    this.stream = stream;
  }

  write(entry: LogEntry): Promise<void> {
    return writeLine(this.stream, entry.line);
  }
}
