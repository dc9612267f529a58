import { z } from "zod";
import { getProcessIdentity } from "../identity.js";
import { category, type LogLevel } from "../levels.js";
import type { Destination, LogEntry } from "../types.js";
import { type EventLogChannel, PlatformEventChannel } from "./platform-event-channel.js";
import { DestinationBaseSchema, parseDestinationOptions, validateDestinationId } from "./validation.js";

/**
 * Options for EventLogDestination.
 */
export interface EventLogDestinationOptions {
  /** Unique identifier */
  id: string;
  /** Event source name (default: the process identity's app name) */
  source?: string;
  /** Minimum level (default: 'error') */
  minimumLevel?: LogLevel;
  /** Start disabled when false (default: true) */
  enabled?: boolean;
  /** Where records go (default: PlatformEventChannel) */
  channel?: EventLogChannel;
}

const EventLogSchema = DestinationBaseSchema.extend({
  source: z.string().trim().min(1, "source cannot be empty").optional(),
});

/**
 * Records each entry's body in the operating system's event log, typed by
 * the level's category.
 */
export class EventLogDestination implements Destination {
  readonly id: string;
  minimumLevel: LogLevel;
  enabled: boolean;
  readonly source: string;
  private readonly channel: EventLogChannel;

  constructor(options: EventLogDestinationOptions) {
    validateDestinationId(options.id);
    const parsed = parseDestinationOptions(EventLogSchema, options, "event log");

    this.id = parsed.id;
    this.minimumLevel = parsed.minimumLevel ?? "error";
    this.enabled = parsed.enabled ?? true;
    this.source = parsed.source ?? getProcessIdentity().appName;
    this.channel = options.channel ?? new PlatformEventChannel();
  }

  write(entry: LogEntry): Promise<void> {
    return this.channel.write({
      source: this.source,
      category: category(entry.level),
      message: entry.body,
    });
  }

  toString(): string {
    return `${this.id}: ${this.source}`;
  }
}
