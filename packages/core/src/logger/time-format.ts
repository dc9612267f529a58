import { ErrorCode } from "@logfan/shared";
import { format } from "date-fns";
import { ConfigurationError } from "../errors/types.js";

/**
 * Pattern used by a new logger: `2026-10-19 08:05:03.042`.
 */
export const DEFAULT_TIME_FORMAT = "yyyy-MM-dd HH:mm:ss.SSS";

const MIN_FRACTION_DIGITS = 1;
const MAX_FRACTION_DIGITS = 7;

type PatternPart = { kind: "token"; text: string } | { kind: "literal"; text: string };

/**
 * Quote text so date-fns renders it verbatim. A run of apostrophes alone is
 * written as bare `''` pairs; quoting it would double it.
 */
function quoteLiteral(text: string): string {
  if (/^'+$/.test(text)) {
    return "''".repeat(text.length);
  }
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Render parts, merging neighbouring literals into one quoted run (two
 * adjacent quoted runs would read as an escaped apostrophe).
 */
function renderParts(parts: readonly PatternPart[]): string {
  let out = "";
  let pending = "";
  for (const part of parts) {
    if (part.kind === "literal") {
      pending += part.text;
      continue;
    }
    if (pending.length > 0) {
      out += quoteLiteral(pending);
      pending = "";
    }
    out += part.text;
  }
  return pending.length > 0 ? out + quoteLiteral(pending) : out;
}

/**
 * Fluent composer for timestamp patterns.
 *
 * Every step appends its token (and an optional literal suffix) and returns
 * the builder, so a whole pattern reads left to right.
 *
 * @example
 * ```typescript
 * const pattern = new TimeFormatBuilder()
 *   .day("/").month("/").year(" ")
 *   .hour(":").minute(":").second(".").millisecond(7)
 *   .toPattern();
 * logger.setTimeFormat(pattern);
 * ```
 */
export class TimeFormatBuilder {
  private parts: readonly PatternPart[] = [];

  /**
   * Append literal text.
   */
  literal(text: string): this {
    if (text.length > 0) {
      this.parts = [...this.parts, { kind: "literal", text }];
    }
    return this;
  }

  year(suffix = ""): this {
    return this.token("yyyy", suffix);
  }

  month(suffix = ""): this {
    return this.token("MM", suffix);
  }

  day(suffix = ""): this {
    return this.token("dd", suffix);
  }

  hour(suffix = ""): this {
    return this.token("HH", suffix);
  }

  minute(suffix = ""): this {
    return this.token("mm", suffix);
  }

  second(suffix = ""): this {
    return this.token("ss", suffix);
  }

  /**
   * Append fractional seconds with `digits` digits (1-7).
   *
   * @throws ConfigurationError when digits is outside [1, 7]
   */
  millisecond(digits = 3, suffix = ""): this {
    if (!Number.isInteger(digits) || digits < MIN_FRACTION_DIGITS || digits > MAX_FRACTION_DIGITS) {
      throw new ConfigurationError(
        `Millisecond digits must be between ${MIN_FRACTION_DIGITS} and ${MAX_FRACTION_DIGITS}, got ${digits}`,
        ErrorCode.INVALID_TIME_FORMAT,
        { context: { digits } }
      );
    }
    return this.token("S".repeat(digits), suffix);
  }

  /**
   * Reset to an empty pattern.
   */
  clear(): this {
    this.parts = [];
    return this;
  }

  toPattern(): string {
    return renderParts(this.parts);
  }

  toString(): string {
    return this.toPattern();
  }

  private token(token: string, suffix: string): this {
    this.parts = [...this.parts, { kind: "token", text: token }];
    return this.literal(suffix);
  }
}

/**
 * Check that a pattern is usable for timestamps.
 *
 * @throws ConfigurationError for an empty pattern or one date-fns rejects
 */
export function validateTimeFormat(pattern: string): string {
  if (pattern.length === 0) {
    throw new ConfigurationError("Time format cannot be empty", ErrorCode.INVALID_TIME_FORMAT);
  }
  try {
    format(new Date(2000, 0, 1), pattern);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid time format "${pattern}": ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INVALID_TIME_FORMAT,
      { cause: error, context: { pattern } }
    );
  }
  return pattern;
}

/**
 * Render a timestamp in local time.
 */
export function formatTimestamp(date: Date, pattern: string): string {
  return format(date, pattern);
}
