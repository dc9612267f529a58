import { QueryCommand } from "./command.js";
import { type LogLevel, shortCode } from "./levels.js";
import { formatTimestamp } from "./time-format.js";

/**
 * The shapes a log payload is recognised as.
 */
export type PayloadShape =
  | { kind: "empty" }
  | { kind: "error-chain"; messages: string[] }
  | { kind: "command"; command: QueryCommand }
  | { kind: "value"; value: unknown };

/**
 * What formatLine needs from an entry.
 */
export interface LineParts {
  timestamp: Date;
  level: LogLevel;
  body: string;
}

/**
 * Converts payloads to text. A logger calls each method once per dispatched
 * entry and hands the results to every destination.
 */
export interface MessageFormatter {
  formatBody(payload: unknown): string;
  formatLine(parts: LineParts, timeFormat: string): string;
}

/**
 * Messages of an error and its causes, outermost first.
 */
function collectErrorMessages(error: Error): string[] {
  const messages: string[] = [];
  const seen = new Set<Error>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    messages.push(current.message);
    current = current.cause;
  }

  return messages;
}

/**
 * Classify a payload.
 */
export function describePayload(payload: unknown): PayloadShape {
  if (payload === null || payload === undefined) {
    return { kind: "empty" };
  }
  if (payload instanceof Error) {
    return { kind: "error-chain", messages: collectErrorMessages(payload) };
  }
  if (payload instanceof QueryCommand) {
    return { kind: "command", command: payload };
  }
  return { kind: "value", value: payload };
}

/**
 * JSON with cycle and bigint guards. Only a reference back to an object on
 * the current path counts as a cycle; repeated siblings are written out.
 */
function safeJson(data: unknown): string | undefined {
  const ancestors: object[] = [];
  return JSON.stringify(data, function (this: unknown, _key: string, value: unknown) {
    if (typeof value === "bigint") return value.toString();
    if (value === null || typeof value !== "object") return value;
    // `this` is the object holding `value`
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }
    if (ancestors.includes(value)) return "[Circular]";
    ancestors.push(value);
    return value;
  });
}

function hasOwnToString(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype || Array.isArray(value)) {
    return false;
  }
  return value.toString !== Object.prototype.toString;
}

/**
 * Generic text conversion for anything that is not a recognised shape.
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value !== "object" || value === null) {
    return String(value);
  }
  if (value instanceof Date || hasOwnToString(value)) {
    return String(value);
  }
  // JSON.stringify yields undefined when toJSON returns nothing
  return safeJson(value) ?? String(value);
}

function formatCommand(command: QueryCommand): string {
  let text = `Command type: ${command.commandType}\n`;
  text += `Command text: ${command.text}\n`;
  for (const [name, value] of command.parameters) {
    text += `Parameter: ${name}, Value: ${stringifyValue(value)}\n`;
  }
  return text;
}

/**
 * Turn a payload into the body text of an entry.
 *
 * Error chains become one message per line (no stack traces); query commands
 * list their parameters; everything else goes through {@link stringifyValue}.
 */
export function formatBody(payload: unknown): string {
  const shape = describePayload(payload);
  switch (shape.kind) {
    case "empty":
      return "";
    case "error-chain":
      return shape.messages.map((message) => `${message}\n`).join("");
    case "command":
      return formatCommand(shape.command);
    case "value":
      return stringifyValue(shape.value);
  }
}

/**
 * `"<timestamp> [<code>] <body>"`
 */
export function formatLine(parts: LineParts, timeFormat: string): string {
  return `${formatTimestamp(parts.timestamp, timeFormat)} [${shortCode(parts.level)}] ${parts.body}`;
}

export const defaultFormatter: MessageFormatter = {
  formatBody,
  formatLine,
};
