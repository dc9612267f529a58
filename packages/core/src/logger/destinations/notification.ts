import { ErrorCode } from "@logfan/shared";
import nodemailer from "nodemailer";
import { z } from "zod";
import { ConfigurationError } from "../../errors/types.js";
import type { ProcessIdentity } from "../identity.js";
import { category, type LogCategory, type LogLevel, shortCode } from "../levels.js";
import type { Destination, LogEntry } from "../types.js";
import { DestinationBaseSchema, parseDestinationOptions, validateDestinationId } from "./validation.js";

export type MailPriority = "high" | "normal" | "low";

/**
 * A composed notification message.
 */
export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  priority: MailPriority;
}

/**
 * Sends mail; the default is a nodemailer SMTP transport.
 */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface SmtpSettings {
  host: string;
  port: number;
}

/**
 * Options for NotificationDestination.
 */
export interface NotificationDestinationOptions {
  /** Unique identifier */
  id: string;
  /** Sender address */
  from: string;
  /** At least one recipient address */
  to: string[];
  /** Fixed subject (default: `[<code>] <app> on <machine>`) */
  subject?: string;
  /** SMTP relay, used when no transport is given */
  smtp?: SmtpSettings;
  /** Mail transport (default: nodemailer SMTP transport for `smtp`) */
  transport?: MailTransport;
  /** Minimum level (default: 'critical') */
  minimumLevel?: LogLevel;
  /** Start disabled when false (default: true) */
  enabled?: boolean;
  /** Identity named in the message (default: the entry's) */
  identity?: ProcessIdentity;
}

const PRIORITY_BY_CATEGORY: Record<LogCategory, MailPriority> = {
  error: "high",
  warning: "normal",
  informational: "low",
};

const SmtpSchema = z.object({
  host: z.string().trim().min(1, "host cannot be empty"),
  port: z.number().int().min(1, "port must be 1-65535").max(65535, "port must be 1-65535"),
});

const NotificationSchema = DestinationBaseSchema.extend({
  from: z.string().trim().min(1, "sender cannot be empty"),
  to: z
    .array(z.string().trim().min(1, "recipient cannot be empty"))
    .min(1, "at least one recipient is required"),
  subject: z.string().optional(),
  smtp: SmtpSchema.optional(),
});

/**
 * nodemailer transport for a plain SMTP relay.
 */
export function createSmtpTransport(settings: SmtpSettings): MailTransport {
  const transporter = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: settings.port === 465,
  });
  return {
    sendMail: (message) => transporter.sendMail(message),
  };
}

function resolveTransport(transport: MailTransport | undefined, smtp: SmtpSettings | undefined): MailTransport {
  if (transport) return transport;
  if (smtp) return createSmtpTransport(smtp);
  throw new ConfigurationError(
    "Invalid notification destination options: either a transport or SMTP settings are required",
    ErrorCode.CONFIG_INVALID
  );
}

/**
 * Compose the mail for an entry.
 */
export function composeMessage(
  entry: LogEntry,
  options: { from: string; to: string[]; subject?: string },
  identity: ProcessIdentity = entry.identity
): MailMessage {
  const subject = options.subject ?? `[${shortCode(entry.level)}] ${identity.appName} on ${identity.machineName}`;
  const text = [
    entry.line,
    "",
    `Application: ${identity.appName}`,
    `Machine: ${identity.machineName}`,
    `User: ${identity.userName}`,
  ].join("\n");

  return {
    from: options.from,
    to: [...options.to],
    subject,
    text,
    priority: PRIORITY_BY_CATEGORY[category(entry.level)],
  };
}

/**
 * Mails each entry to a fixed list of recipients.
 *
 * @example
 * ```typescript
 * logger.addDestination(new NotificationDestination({
 *   id: 'oncall',
 *   from: 'alerts@example.com',
 *   to: ['oncall@example.com'],
 *   smtp: { host: 'smtp.example.com', port: 25 },
 * }));
 * ```
 */
export class NotificationDestination implements Destination {
  readonly id: string;
  minimumLevel: LogLevel;
  enabled: boolean;
  private readonly from: string;
  private readonly to: string[];
  private readonly subject?: string;
  private readonly relay?: SmtpSettings;
  private readonly transport: MailTransport;
  private readonly identity?: ProcessIdentity;

  constructor(options: NotificationDestinationOptions) {
    validateDestinationId(options.id);
    const parsed = parseDestinationOptions(
      NotificationSchema,
      options,
      "notification",
      ErrorCode.INVALID_RECIPIENTS
    );

    this.id = parsed.id;
    this.minimumLevel = parsed.minimumLevel ?? "critical";
    this.enabled = parsed.enabled ?? true;
    this.from = parsed.from;
    this.to = parsed.to;
    this.subject = parsed.subject;
    this.relay = parsed.smtp;
    this.identity = options.identity;

    this.transport = resolveTransport(options.transport, parsed.smtp);
  }

  async write(entry: LogEntry): Promise<void> {
    await this.transport.sendMail(
      composeMessage(entry, { from: this.from, to: this.to, subject: this.subject }, this.identity)
    );
  }

  toString(): string {
    return this.relay ? `${this.id}: ${this.relay.host}:${this.relay.port}` : `${this.id}: ${this.to.join(", ")}`;
  }
}
