import * as os from "node:os";
import * as path from "node:path";

/**
 * Who is logging: attached to entries routed to identity-aware sinks
 * (tabular store, notification, platform event log).
 */
export interface ProcessIdentity {
  readonly appName: string;
  readonly machineName: string;
  readonly userName: string;
}

let cached: ProcessIdentity | undefined;

function resolveAppName(): string {
  const script = process.argv[1];
  const source = script && script.length > 0 ? script : process.execPath;
  return path.basename(source, path.extname(source));
}

function resolveUserName(): string {
  try {
    return os.userInfo().username;
  } catch {
    // userInfo throws when the uid has no passwd entry (common in containers)
    return process.env.USER ?? process.env.USERNAME ?? "";
  }
}

/**
 * Identity of the current process, resolved on first call and then reused.
 */
export function getProcessIdentity(): ProcessIdentity {
  if (!cached) {
    cached = Object.freeze({
      appName: resolveAppName(),
      machineName: os.hostname(),
      userName: resolveUserName(),
    });
  }
  return cached;
}
