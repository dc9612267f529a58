import { formatBody, formatLine } from "../../formatter.js";
import type { ProcessIdentity } from "../../identity.js";
import type { LogLevel } from "../../levels.js";
import { DEFAULT_TIME_FORMAT } from "../../time-format.js";
import type { LogEntry } from "../../types.js";
import type { LineStream } from "../stream.js";

export const IDENTITY: ProcessIdentity = { appName: "billing", machineName: "host-1", userName: "svc" };

export const AT = new Date(2026, 9, 19, 8, 5, 3, 42);

/**
 * Entry as a logger would build it.
 */
export function makeEntry(level: LogLevel, payload: unknown, timestamp: Date = AT): LogEntry {
  const body = formatBody(payload);
  return {
    timestamp,
    level,
    payload,
    body,
    line: formatLine({ timestamp, level, body }, DEFAULT_TIME_FORMAT),
    identity: IDENTITY,
  };
}

/**
 * In-memory stream that records every chunk.
 */
export function createMockStream(
  isTTY: boolean,
  error?: Error
): LineStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write(chunk: string, callback: (error?: Error | null) => void) {
      chunks.push(chunk);
      callback(error ?? null);
      return true;
    },
  };
}
