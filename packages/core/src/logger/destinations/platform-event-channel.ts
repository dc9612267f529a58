import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { LogCategory } from "../levels.js";

const execFileAsync = promisify(execFile);

/**
 * One record for the operating system's event log.
 */
export interface EventLogRecord {
  source: string;
  category: LogCategory;
  message: string;
}

/**
 * Writes records to an event log.
 */
export interface EventLogChannel {
  write(record: EventLogRecord): Promise<void>;
}

export interface EventLogCommand {
  file: string;
  args: string[];
}

const WINDOWS_EVENT_TYPES: Record<LogCategory, string> = {
  informational: "INFORMATION",
  warning: "WARNING",
  error: "ERROR",
};

const SYSLOG_PRIORITIES: Record<LogCategory, string> = {
  informational: "info",
  warning: "warning",
  error: "err",
};

/** eventcreate accepts ids 1-1000 */
const WINDOWS_EVENT_ID = "1000";

/**
 * The command that records `record` on `platform`: `eventcreate` into the
 * Windows Application log, `logger` (syslog) everywhere else.
 */
export function buildEventLogCommand(platform: NodeJS.Platform, record: EventLogRecord): EventLogCommand {
  if (platform === "win32") {
    return {
      file: "eventcreate",
      args: [
        "/L",
        "APPLICATION",
        "/T",
        WINDOWS_EVENT_TYPES[record.category],
        "/SO",
        record.source,
        "/ID",
        WINDOWS_EVENT_ID,
        "/D",
        record.message,
      ],
    };
  }

  return {
    file: "logger",
    args: ["-t", record.source, "-p", `user.${SYSLOG_PRIORITIES[record.category]}`, "--", record.message],
  };
}

/**
 * Event log channel backed by the platform's command-line tool.
 */
export class PlatformEventChannel implements EventLogChannel {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async write(record: EventLogRecord): Promise<void> {
    const { file, args } = buildEventLogCommand(this.platform, record);
    await execFileAsync(file, args, { windowsHide: true });
  }
}
