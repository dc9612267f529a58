import type { WriteFailure } from "../errors/types.js";
import type { MessageFormatter } from "./formatter.js";
import type { ProcessIdentity } from "./identity.js";
import type { LogLevel } from "./levels.js";
import type { TimeFormatBuilder } from "./time-format.js";

/**
 * A single log entry, created per log call and shared read-only by every
 * destination of that call.
 */
export interface LogEntry {
  /** When the log call was made */
  readonly timestamp: Date;
  /** Severity level of the log */
  readonly level: LogLevel;
  /** The payload exactly as passed by the caller */
  readonly payload: unknown;
  /** Payload as text (computed once) */
  readonly body: string;
  /** `"<timestamp> [<code>] <body>"` (computed once) */
  readonly line: string;
  /** Identity of the logging process */
  readonly identity: ProcessIdentity;
  /** OpenTelemetry trace ID (when within active span) */
  readonly traceId?: string;
  /** OpenTelemetry span ID (when within active span) */
  readonly spanId?: string;
}

/**
 * An output channel with its own severity filter and on/off switch.
 *
 * Implementations only need to write; the logger filters, serializes writes
 * per instance, and discards whatever `write` throws or rejects with.
 */
export interface Destination {
  /** Unique key within a logger */
  readonly id: string;
  /** Entries below this level are not written */
  minimumLevel: LogLevel;
  /** Disabled destinations receive nothing */
  enabled: boolean;
  /** Write one entry */
  write(entry: LogEntry): Promise<void>;
}

/**
 * Options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Start globally enabled (default: true) */
  enabled?: boolean;
  /** Timestamp pattern or builder (default: DEFAULT_TIME_FORMAT) */
  timeFormat?: string | TimeFormatBuilder;
  /** Write to destinations concurrently (default: true) */
  concurrent?: boolean;
  /** Enable history with this capacity (default: disabled) */
  historyCapacity?: number;
  /** Pre-configured destinations, added in order */
  destinations?: Destination[];
  /** Payload formatter (default: defaultFormatter) */
  formatter?: MessageFormatter;
  /** Abandon a destination write after this many milliseconds */
  writeTimeoutMs?: number;
  /** Receives each discarded write failure (default: none) */
  onWriteFailure?: (failure: WriteFailure) => void;
  /** Identity attached to entries (default: getProcessIdentity()) */
  identity?: ProcessIdentity;
  /** Clock (default: () => new Date()) */
  now?: () => Date;
}
