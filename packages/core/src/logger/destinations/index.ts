export type { ConsoleDestinationOptions } from "./console.js";
export { ConsoleDestination } from "./console.js";
export type { ConnectionDescriptor, ResolvedConnection } from "./connection.js";
export { CONNECT_TIMEOUT_MS, parseConnectionString, resolveConnection } from "./connection.js";
export type { EventLogDestinationOptions } from "./event-log.js";
export { EventLogDestination } from "./event-log.js";
export type { FileDestinationOptions } from "./file.js";
export { FileDestination } from "./file.js";
export { MssqlRowWriter, toMssqlConfig } from "./mssql-writer.js";
export type {
  MailMessage,
  MailPriority,
  MailTransport,
  NotificationDestinationOptions,
  SmtpSettings,
} from "./notification.js";
export { composeMessage, createSmtpTransport, NotificationDestination } from "./notification.js";
export type { EventLogChannel, EventLogCommand, EventLogRecord } from "./platform-event-channel.js";
export { buildEventLogCommand, PlatformEventChannel } from "./platform-event-channel.js";
export type { LineStream } from "./stream.js";
export type { LogRow, RowWriter, TabularStoreDestinationOptions } from "./tabular-store.js";
export { TabularStoreDestination, toLogRow } from "./tabular-store.js";
export type { TraceDestinationOptions } from "./trace.js";
export { TraceDestination } from "./trace.js";
export { validateDestinationId } from "./validation.js";
