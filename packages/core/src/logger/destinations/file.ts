import * as fs from "node:fs";
import { appendFile, readdir, readFile, rename, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { ErrorCode } from "@logfan/shared";
import { format } from "date-fns";
import picomatch from "picomatch";
import { z } from "zod";
import { ConfigurationError } from "../../errors/types.js";
import { attempt } from "../attempt.js";
import type { LogLevel } from "../levels.js";
import type { Destination, LogEntry } from "../types.js";
import { DestinationBaseSchema, parseDestinationOptions, validateDestinationId } from "./validation.js";

/**
 * Options for FileDestination.
 */
export interface FileDestinationOptions {
  /** Unique identifier */
  id: string;
  /** Directory holding the log file (default: process.cwd()) */
  directory?: string;
  /** File name; `.log` is appended when it has no extension (default: entry date, `yyyy-MM-dd.log`) */
  fileName?: string;
  /** Minimum level (default: 'info') */
  minimumLevel?: LogLevel;
  /** Start disabled when false (default: true) */
  enabled?: boolean;
  /** Archive the file once it holds this many lines (0 = no limit) */
  maxLines?: number;
  /** Archive the file once it grows past this many bytes (0 = no limit) */
  maxBytes?: number;
}

const LOG_EXTENSION = ".log";
const NEWLINE = 0x0a;

const limit = z.number().int().nonnegative().optional();

const FileDestinationSchema = DestinationBaseSchema.extend({
  directory: z.string().min(1, "cannot be empty").optional(),
  fileName: z
    .string()
    .min(1, "cannot be empty")
    .refine((name) => path.basename(name) === name, "must be a bare file name")
    .optional(),
  maxLines: limit,
  maxBytes: limit,
});

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function escapeGlob(text: string): string {
  return text.replace(/[\\*?[\]{}()!+@|^$]/g, "\\$&");
}

/**
 * Number of lines in a file, or undefined when it does not exist.
 */
async function countLines(filePath: string): Promise<number | undefined> {
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }

  let lines = 0;
  for (const byte of content) {
    if (byte === NEWLINE) lines++;
  }
  if (content.length > 0 && content[content.length - 1] !== NEWLINE) {
    lines++;
  }
  return lines;
}

/**
 * Size of a file in bytes, or undefined when it does not exist.
 */
async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    return (await stat(filePath)).size;
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }
}

/**
 * Appends each line to a file, archiving the file first when it has reached
 * `maxLines` or grown past `maxBytes`.
 *
 * Archives sit next to the live file as `<base>_<seq>.<ext>`, where `seq` is
 * the number of `<base>*<ext>` files in the directory, zero-padded to three
 * digits. A failed archive leaves the live file in place and the line is
 * appended anyway.
 *
 * @example
 * ```typescript
 * const destination = new FileDestination({
 *   id: 'file',
 *   directory: './logs',
 *   fileName: 'app',
 *   maxLines: 10_000,
 *   maxBytes: 5 * 1024 * 1024,
 * });
 * logger.addDestination(destination);
 * ```
 */
export class FileDestination implements Destination {
  readonly id: string;
  minimumLevel: LogLevel;
  enabled: boolean;
  maxLines: number;
  maxBytes: number;
  private readonly directory: string;
  private readonly fileName?: string;

  constructor(options: FileDestinationOptions) {
    validateDestinationId(options.id);
    const parsed = parseDestinationOptions(FileDestinationSchema, options, "file");

    this.id = parsed.id;
    this.minimumLevel = parsed.minimumLevel ?? "info";
    this.enabled = parsed.enabled ?? true;
    this.maxLines = parsed.maxLines ?? 0;
    this.maxBytes = parsed.maxBytes ?? 0;
    this.directory = path.resolve(parsed.directory ?? process.cwd());
    this.fileName =
      parsed.fileName === undefined || path.extname(parsed.fileName) !== ""
        ? parsed.fileName
        : `${parsed.fileName}${LOG_EXTENSION}`;

    this.ensureDirectory();
  }

  /**
   * Path of the live file for entries written at `date`.
   */
  filePath(date: Date = new Date()): string {
    return path.join(this.directory, this.fileName ?? `${format(date, "yyyy-MM-dd")}${LOG_EXTENSION}`);
  }

  async write(entry: LogEntry): Promise<void> {
    const filePath = this.filePath(entry.timestamp);

    if (this.maxLines > 0 || this.maxBytes > 0) {
      await attempt(() => this.maintain(filePath));
    }

    await appendFile(filePath, `${entry.line}\n`, "utf8");
  }

  toString(): string {
    return `${this.id}: ${this.filePath()}`;
  }

  /**
   * Lines first; size only when the line check did not archive.
   */
  private async maintain(filePath: string): Promise<void> {
    if (this.maxLines > 0) {
      const lines = await countLines(filePath);
      if (lines !== undefined && lines > this.maxLines - 1) {
        await this.archive(filePath);
        return;
      }
    }

    if (this.maxBytes > 0) {
      const size = await fileSize(filePath);
      if (size !== undefined && size > this.maxBytes) {
        await this.archive(filePath);
      }
    }
  }

  private async archive(filePath: string): Promise<void> {
    const directory = path.dirname(filePath);
    const ext = path.extname(filePath);
    const base = path.basename(filePath, ext);

    const isSibling = picomatch(`${escapeGlob(base)}*${escapeGlob(ext)}`, { dot: true });
    const seq = (await readdir(directory)).filter((name) => isSibling(name)).length;
    const archivePath = path.join(directory, `${base}_${String(seq).padStart(3, "0")}${ext}`);

    await rm(archivePath, { force: true });
    await rename(filePath, archivePath);
  }

  private ensureDirectory(): void {
    try {
      fs.mkdirSync(this.directory, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(
        `Cannot create log directory "${this.directory}"`,
        ErrorCode.CONFIG_INVALID,
        { cause: error, context: { directory: this.directory } }
      );
    }
  }
}
