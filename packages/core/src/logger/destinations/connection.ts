import { ErrorCode } from "@logfan/shared";
import { z } from "zod";
import { ConfigurationError } from "../../errors/types.js";

/**
 * Where the tabular store lives and how to authenticate.
 */
export interface ConnectionDescriptor {
  server: string;
  database: string;
  port?: number;
  user?: string;
  password?: string;
  integratedSecurity?: boolean;
}

/**
 * A validated descriptor: credentials are either a full user/password pair or
 * integrated security.
 */
export interface ResolvedConnection {
  readonly server: string;
  readonly database: string;
  readonly port?: number;
  readonly user?: string;
  readonly password?: string;
  readonly integratedSecurity: boolean;
  readonly connectTimeoutMs: number;
}

/**
 * Connect timeout applied to every tabular store connection.
 */
export const CONNECT_TIMEOUT_MS = 2000;

const KEY_ALIASES: Record<string, keyof ConnectionDescriptor> = {
  server: "server",
  "data source": "server",
  address: "server",
  addr: "server",
  "network address": "server",
  database: "database",
  "initial catalog": "database",
  "user id": "user",
  uid: "user",
  user: "user",
  password: "password",
  pwd: "password",
  "integrated security": "integratedSecurity",
  trusted_connection: "integratedSecurity",
};

const TRUTHY = new Set(["true", "yes", "sspi"]);

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.length === 0 ? undefined : value));

const ConnectionSchema = z
  .object({
    server: optionalText,
    database: optionalText,
    port: z.number().int().min(1).max(65535).optional(),
    user: optionalText,
    password: optionalText,
    integratedSecurity: z.boolean().optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.server || !value.database) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "server and database must be specified",
      });
    }
    if (!value.integratedSecurity && (value.user === undefined) !== (value.password === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "user and password must be given together",
      });
    }
  });

/**
 * Split a `Key=Value;Key=Value` connection string into a descriptor.
 * Keys are case-insensitive; `Server=host,1433` carries the port.
 */
export function parseConnectionString(connectionString: string): Partial<ConnectionDescriptor> {
  const descriptor: Partial<ConnectionDescriptor> = {};

  for (const pair of connectionString.split(";")) {
    const separator = pair.indexOf("=");
    if (separator === -1) continue;

    const key = KEY_ALIASES[pair.slice(0, separator).trim().toLowerCase()];
    const value = pair.slice(separator + 1).trim();

    switch (key) {
      case "server": {
        const [host = "", port] = value.replace(/^tcp:/i, "").split(",");
        descriptor.server = host.trim();
        if (port !== undefined && port.trim() !== "") {
          descriptor.port = Number(port.trim());
        }
        break;
      }
      case "database":
        descriptor.database = value;
        break;
      case "user":
        descriptor.user = value;
        break;
      case "password":
        descriptor.password = value;
        break;
      case "integratedSecurity":
        descriptor.integratedSecurity = TRUTHY.has(value.toLowerCase());
        break;
      default:
        break;
    }
  }

  return descriptor;
}

/**
 * Validate a connection string or descriptor.
 *
 * Both credentials absent means integrated security.
 *
 * @throws ConfigurationError when server or database is missing, or when only
 *   one of user/password is given
 */
export function resolveConnection(connection: string | ConnectionDescriptor): ResolvedConnection {
  if (typeof connection === "string" && connection.trim().length === 0) {
    throw new ConfigurationError("Connection string cannot be empty", ErrorCode.INVALID_CONNECTION);
  }

  const descriptor = typeof connection === "string" ? parseConnectionString(connection) : connection;
  const result = ConnectionSchema.safeParse(descriptor);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid connection: ${result.error.issues.map((issue) => issue.message).join("; ")}`,
      ErrorCode.INVALID_CONNECTION,
      { cause: result.error }
    );
  }

  const { server, database, port, user, password, integratedSecurity } = result.data;
  if (!server || !database) {
    // superRefine above already rejects this; narrows the types
    throw new ConfigurationError("server and database must be specified", ErrorCode.INVALID_CONNECTION);
  }

  const integrated = integratedSecurity === true || (user === undefined && password === undefined);
  return {
    server,
    database,
    port,
    user: integrated ? undefined : user,
    password: integrated ? undefined : password,
    integratedSecurity: integrated,
    connectTimeoutMs: CONNECT_TIMEOUT_MS,
  };
}
