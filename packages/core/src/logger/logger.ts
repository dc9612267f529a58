import { context, trace } from "@opentelemetry/api";
import type { WriteFailure } from "../errors/types.js";
import { attempt } from "./attempt.js";
import { validateDestinationId } from "./destinations/validation.js";
import { defaultFormatter, type MessageFormatter } from "./formatter.js";
import { HistoryBuffer } from "./history.js";
import { getProcessIdentity, type ProcessIdentity } from "./identity.js";
import { isAtLeast, type LogLevel } from "./levels.js";
import { lockFor } from "./lock.js";
import { DEFAULT_TIME_FORMAT, TimeFormatBuilder, validateTimeFormat } from "./time-format.js";
import type { Destination, LogEntry, LoggerOptions } from "./types.js";

/**
 * Default history capacity used by enableHistory().
 */
export const DEFAULT_HISTORY_CAPACITY = 1000;

/**
 * Registry of destinations that filters and fans out every log call.
 *
 * Each leveled method resolves once every qualifying destination has finished
 * writing. It never rejects because of a destination: write failures are
 * discarded (and reported to `onWriteFailure` when one is given).
 *
 * @example
 * ```typescript
 * const logger = new Logger()
 *   .addDestination(new FileDestination({ id: "file", maxLines: 10_000 }))
 *   .addDestination(new ConsoleDestination({ id: "console" }));
 *
 * await logger.info("Application started");
 * await logger.error(new Error("Request failed", { cause: ioError }));
 * ```
 */
export class Logger {
  private readonly destinations = new Map<string, Destination>();
  private enabled: boolean;
  private timeFormat: string;
  private concurrent: boolean;
  private history: HistoryBuffer | null = null;
  private historyActive = false;
  private readonly formatter: MessageFormatter;
  private readonly writeTimeoutMs?: number;
  private readonly onWriteFailure?: (failure: WriteFailure) => void;
  private readonly identity: ProcessIdentity;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.timeFormat = resolveTimeFormat(options.timeFormat ?? DEFAULT_TIME_FORMAT);
    this.concurrent = options.concurrent ?? true;
    this.formatter = options.formatter ?? defaultFormatter;
    this.writeTimeoutMs = options.writeTimeoutMs;
    this.onWriteFailure = options.onWriteFailure;
    this.identity = options.identity ?? getProcessIdentity();
    this.now = options.now ?? (() => new Date());

    for (const destination of options.destinations ?? []) {
      this.addDestination(destination);
    }
    if (options.historyCapacity !== undefined) {
      this.enableHistory(options.historyCapacity);
    }
  }

  // ============================================
  // Leveled log methods
  // ============================================

  debug(payload: unknown): Promise<void> {
    return this.log("debug", payload);
  }

  info(payload: unknown): Promise<void> {
    return this.log("info", payload);
  }

  warn(payload: unknown): Promise<void> {
    return this.log("warn", payload);
  }

  error(payload: unknown): Promise<void> {
    return this.log("error", payload);
  }

  critical(payload: unknown): Promise<void> {
    return this.log("critical", payload);
  }

  // ============================================
  // Destinations
  // ============================================

  /**
   * Add a destination, replacing any destination registered under the same id.
   */
  addDestination(destination: Destination): this {
    validateDestinationId(destination.id);
    this.destinations.set(destination.id, destination);
    return this;
  }

  /**
   * @returns whether a destination was registered under `id`
   */
  removeDestination(id: string): boolean {
    validateDestinationId(id);
    return this.destinations.delete(id);
  }

  removeAllDestinations(): void {
    this.destinations.clear();
  }

  hasDestination(id: string): boolean {
    return this.destinations.has(id);
  }

  getDestination(id: string): Destination | undefined {
    return this.destinations.get(id);
  }

  /**
   * Registered destinations in insertion order.
   */
  listDestinations(): Destination[] {
    return [...this.destinations.values()];
  }

  /** No-op when no destination has this id. */
  enableDestination(id: string): void {
    this.withDestination(id, (destination) => {
      destination.enabled = true;
    });
  }

  /** No-op when no destination has this id. */
  disableDestination(id: string): void {
    this.withDestination(id, (destination) => {
      destination.enabled = false;
    });
  }

  /** No-op when no destination has this id. */
  setDestinationLevel(id: string, level: LogLevel): void {
    this.withDestination(id, (destination) => {
      destination.minimumLevel = level;
    });
  }

  // ============================================
  // Settings
  // ============================================

  enable(): void {
    this.enabled = true;
  }

  /**
   * Stop all logging. Log calls return immediately without formatting.
   */
  disable(): void {
    this.enabled = false;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * @throws ConfigurationError for an empty or invalid pattern
   */
  setTimeFormat(format: string | TimeFormatBuilder): this {
    this.timeFormat = resolveTimeFormat(format);
    return this;
  }

  getTimeFormat(): string {
    return this.timeFormat;
  }

  /**
   * Concurrent: all destinations written at once. Sequential: one after the
   * other, in insertion order.
   */
  setConcurrentDispatch(concurrent: boolean): this {
    this.concurrent = concurrent;
    return this;
  }

  isConcurrentDispatch(): boolean {
    return this.concurrent;
  }

  // ============================================
  // History
  // ============================================

  /**
   * Start (or resume) recording formatted lines. A paused buffer keeps its
   * contents and capacity; `capacity` only applies to a new buffer.
   */
  enableHistory(capacity: number = DEFAULT_HISTORY_CAPACITY): this {
    if (!this.history) {
      this.history = new HistoryBuffer(capacity);
    }
    this.historyActive = true;
    return this;
  }

  /**
   * Stop recording and drop the buffer.
   */
  disableHistory(): void {
    this.historyActive = false;
    this.history = null;
  }

  /**
   * Stop recording but keep what was recorded.
   */
  pauseHistory(): void {
    this.historyActive = false;
  }

  clearHistory(): void {
    this.history?.clear();
  }

  /**
   * Recorded lines, oldest first. Empty when history was never enabled or
   * has been disabled.
   */
  getHistory(): Iterable<string> {
    return this.history?.snapshot() ?? [];
  }

  isHistoryEnabled(): boolean {
    return this.historyActive;
  }

  // ============================================
  // Dispatch
  // ============================================

  private async log(level: LogLevel, payload: unknown): Promise<void> {
    if (!this.enabled) {
      return;
    }

    const entry = this.createEntry(level, payload);
    const targets = this.selectDestinations(level);

    if (this.concurrent) {
      await Promise.all(targets.map((destination) => this.deliver(destination, entry)));
    } else {
      for (const destination of targets) {
        await this.deliver(destination, entry);
      }
    }

    if (this.historyActive) {
      this.history?.append(entry.line);
    }
  }

  private createEntry(level: LogLevel, payload: unknown): LogEntry {
    const timestamp = this.now();
    const body = this.formatter.formatBody(payload);
    const line = this.formatter.formatLine({ timestamp, level, body }, this.timeFormat);

    return Object.freeze({
      timestamp,
      level,
      payload,
      body,
      line,
      identity: this.identity,
      ...this.getTraceContext(),
    });
  }

  private selectDestinations(level: LogLevel): Destination[] {
    return this.listDestinations().filter(
      (destination) => destination.enabled && isAtLeast(level, destination.minimumLevel)
    );
  }

  /**
   * One destination write: serialized per instance, failures discarded.
   */
  private async deliver(destination: Destination, entry: LogEntry): Promise<void> {
    const lock = lockFor(destination);
    await attempt(() => lock.runExclusive(() => destination.write(entry), this.writeTimeoutMs), {
      timeoutMs: this.writeTimeoutMs,
      destinationId: destination.id,
      onDiscard: this.onWriteFailure,
    });
  }

  private withDestination(id: string, action: (destination: Destination) => void): void {
    validateDestinationId(id);
    const destination = this.destinations.get(id);
    if (destination) {
      action(destination);
    }
  }

  /**
   * Extract trace context from OpenTelemetry active span.
   */
  private getTraceContext(): { traceId?: string; spanId?: string } {
    const span = trace.getSpan(context.active());
    if (span) {
      const ctx = span.spanContext();
      return { traceId: ctx.traceId, spanId: ctx.spanId };
    }
    return {};
  }
}

function resolveTimeFormat(format: string | TimeFormatBuilder): string {
  return validateTimeFormat(format instanceof TimeFormatBuilder ? format.toPattern() : format);
}
