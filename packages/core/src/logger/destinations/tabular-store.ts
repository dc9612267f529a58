import { ErrorCode } from "@logfan/shared";
import { z } from "zod";
import type { ProcessIdentity } from "../identity.js";
import { levelLabel, type LogLevel } from "../levels.js";
import type { Destination, LogEntry } from "../types.js";
import { type ConnectionDescriptor, type ResolvedConnection, resolveConnection } from "./connection.js";
import { MssqlRowWriter } from "./mssql-writer.js";
import { DestinationBaseSchema, parseDestinationOptions, validateDestinationId } from "./validation.js";

/**
 * One row of the `LogEntries` table.
 */
export interface LogRow {
  app: string;
  machine: string;
  username: string;
  timestamp: Date;
  level: string;
  /** Reserved column, currently always empty */
  category: string;
  message: string;
}

/**
 * Persists rows; the default talks to SQL Server.
 */
export interface RowWriter {
  insert(row: LogRow): Promise<void>;
}

/**
 * Options for TabularStoreDestination.
 */
export interface TabularStoreDestinationOptions {
  /** Unique identifier */
  id: string;
  /** Connection string (`Server=...;Database=...;User Id=...;Password=...`) or descriptor */
  connection: string | ConnectionDescriptor;
  /** Minimum level (default: 'warn') */
  minimumLevel?: LogLevel;
  /** Start disabled when false (default: true) */
  enabled?: boolean;
  /** Row writer (default: MssqlRowWriter for the connection) */
  writer?: (connection: ResolvedConnection) => RowWriter;
  /** Identity written to App/Machine/Username (default: the entry's) */
  identity?: ProcessIdentity;
}

const TabularStoreSchema = DestinationBaseSchema.extend({
  connection: z.union([z.string(), z.object({}).passthrough()]),
});

/**
 * Build the row stored for an entry.
 */
export function toLogRow(entry: LogEntry, identity: ProcessIdentity = entry.identity): LogRow {
  return {
    app: identity.appName,
    machine: identity.machineName,
    username: identity.userName,
    timestamp: entry.timestamp,
    level: levelLabel(entry.level),
    category: "",
    message: entry.body,
  };
}

/**
 * Writes one row per entry into a `LogEntries` table:
 * `App, Machine, Username, Timestamp, Level, Category, Message`.
 *
 * The connection is validated at construction; nothing connects until the
 * first write.
 *
 * @example
 * ```typescript
 * logger.addDestination(new TabularStoreDestination({
 *   id: 'db',
 *   connection: 'Server=db.internal,1433;Database=Logs;User Id=logger;Password=test-secret',
 * }));
 * ```
 */
export class TabularStoreDestination implements Destination {
  readonly id: string;
  minimumLevel: LogLevel;
  enabled: boolean;
  readonly connection: ResolvedConnection;
  private readonly writer: RowWriter;
  private readonly identity?: ProcessIdentity;

  constructor(options: TabularStoreDestinationOptions) {
    validateDestinationId(options.id);
    const parsed = parseDestinationOptions(
      TabularStoreSchema,
      options,
      "tabular store",
      ErrorCode.INVALID_CONNECTION
    );

    this.id = parsed.id;
    this.minimumLevel = parsed.minimumLevel ?? "warn";
    this.enabled = parsed.enabled ?? true;
    this.connection = resolveConnection(options.connection);
    this.writer = (options.writer ?? ((connection) => new MssqlRowWriter(connection)))(this.connection);
    this.identity = options.identity;
  }

  write(entry: LogEntry): Promise<void> {
    return this.writer.insert(toLogRow(entry, this.identity));
  }

  toString(): string {
    return `${this.id}: ${this.connection.server},${this.connection.database}`;
  }
}
