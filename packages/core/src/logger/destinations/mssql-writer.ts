import sql, { type config as MssqlConfig } from "mssql";
import type { ResolvedConnection } from "./connection.js";
import type { LogRow, RowWriter } from "./tabular-store.js";

const INSERT_ROW =
  "INSERT INTO LogEntries (App, Machine, Username, Timestamp, Level, Category, Message) " +
  "VALUES (@App, @Machine, @Username, @Timestamp, @Level, @Category, @Message)";

/**
 * Build the mssql pool configuration for a validated connection.
 */
export function toMssqlConfig(connection: ResolvedConnection): MssqlConfig {
  return {
    server: connection.server,
    database: connection.database,
    port: connection.port,
    user: connection.user,
    password: connection.password,
    connectionTimeout: connection.connectTimeoutMs,
    options: {
      trustedConnection: connection.integratedSecurity,
      trustServerCertificate: true,
    },
  };
}

/**
 * Inserts rows into the `LogEntries` table of a SQL Server database.
 *
 * Opens a connection per row and closes it afterwards, so an unreachable
 * server costs at most the connect timeout and leaves nothing open.
 */
export class MssqlRowWriter implements RowWriter {
  private readonly config: MssqlConfig;

  constructor(connection: ResolvedConnection) {
    this.config = toMssqlConfig(connection);
  }

  async insert(row: LogRow): Promise<void> {
    const pool = new sql.ConnectionPool(this.config);
    await pool.connect();
    try {
      await pool
        .request()
        .input("App", sql.NVarChar, row.app)
        .input("Machine", sql.NVarChar, row.machine)
        .input("Username", sql.NVarChar, row.username)
        .input("Timestamp", sql.DateTime2, row.timestamp)
        .input("Level", sql.NVarChar, row.level)
        .input("Category", sql.NVarChar, row.category)
        .input("Message", sql.NVarChar(sql.MAX), row.message)
        .query(INSERT_ROW);
    } finally {
      await pool.close();
    }
  }
}
