import { ErrorCode } from "@logfan/shared";
import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../../../errors/types.js";
import { CONNECT_TIMEOUT_MS, parseConnectionString, type ResolvedConnection, resolveConnection } from "../connection.js";
import { toMssqlConfig } from "../mssql-writer.js";
import { type RowWriter, TabularStoreDestination, toLogRow } from "../tabular-store.js";
import { AT, makeEntry } from "./helpers.js";

const CONNECTION = "Server=tcp:db.internal,1433;Database=Logs;User Id=logger;Password=test-secret";

function createMockWriter(): RowWriter & { insert: ReturnType<typeof vi.fn> } {
  return { insert: vi.fn().mockResolvedValue(undefined) };
}

describe("parseConnectionString", () => {
  it("reads server, port, database and credentials", () => {
    expect(parseConnectionString(CONNECTION)).toEqual({
      server: "db.internal",
      port: 1433,
      database: "Logs",
      user: "logger",
      password: "test-secret",
    });
  });

  it("accepts the long key names in any case", () => {
    expect(parseConnectionString("DATA SOURCE=db;initial catalog=Logs;Trusted_Connection=yes")).toEqual({
      server: "db",
      database: "Logs",
      integratedSecurity: true,
    });
  });

  it("skips unknown keys and malformed pairs", () => {
    expect(parseConnectionString("Server=db;Encrypt=true;junk;;Database=Logs")).toEqual({
      server: "db",
      database: "Logs",
    });
  });
});

describe("resolveConnection", () => {
  it("keeps a full credential pair", () => {
    expect(resolveConnection(CONNECTION)).toEqual({
      server: "db.internal",
      database: "Logs",
      port: 1433,
      user: "logger",
      password: "test-secret",
      integratedSecurity: false,
      connectTimeoutMs: CONNECT_TIMEOUT_MS,
    });
  });

  it("falls back to integrated security without credentials", () => {
    const connection = resolveConnection({ server: "db", database: "Logs" });

    expect(connection.integratedSecurity).toBe(true);
    expect(connection.user).toBeUndefined();
    expect(connection.connectTimeoutMs).toBe(2000);
  });

  it("drops credentials when integrated security is requested", () => {
    const connection = resolveConnection("Server=db;Database=Logs;Integrated Security=SSPI;User Id=logger");

    expect(connection.integratedSecurity).toBe(true);
    expect(connection.user).toBeUndefined();
  });

  it("requires server and database", () => {
    expect(() => resolveConnection("Database=Logs")).toThrow(
      "Invalid connection: server and database must be specified"
    );
    expect(() => resolveConnection({ server: "db", database: "" })).toThrow(ConfigurationError);
  });

  it("requires user and password together", () => {
    expect(() => resolveConnection("Server=db;Database=Logs;User Id=logger")).toThrow(
      "Invalid connection: user and password must be given together"
    );
    expect(() => resolveConnection({ server: "db", database: "Logs", password: "test-secret" })).toThrow(
      ConfigurationError
    );
  });

  it("rejects an empty string", () => {
    expect(() => resolveConnection("  ")).toThrow("Connection string cannot be empty");
  });

  it("rejects a port out of range", () => {
    expect(() => resolveConnection("Server=db,70000;Database=Logs")).toThrow(ConfigurationError);
  });
});

describe("toMssqlConfig", () => {
  it("maps a resolved connection to pool settings", () => {
    const connection: ResolvedConnection = resolveConnection(CONNECTION);

    expect(toMssqlConfig(connection)).toEqual({
      server: "db.internal",
      database: "Logs",
      port: 1433,
      user: "logger",
      password: "test-secret",
      connectionTimeout: 2000,
      options: {
        trustedConnection: false,
        trustServerCertificate: true,
      },
    });
  });
});

describe("TabularStoreDestination", () => {
  it("inserts one row per entry", async () => {
    const writer = createMockWriter();
    const destination = new TabularStoreDestination({
      id: "db",
      connection: CONNECTION,
      writer: () => writer,
    });

    await destination.write(makeEntry("warn", "disk full"));

    expect(writer.insert).toHaveBeenCalledWith({
      app: "billing",
      machine: "host-1",
      username: "svc",
      timestamp: AT,
      level: "Warn",
      category: "",
      message: "disk full",
    });
  });

  it("hands the resolved connection to the writer factory", () => {
    const factory = vi.fn((_connection: ResolvedConnection) => createMockWriter());

    new TabularStoreDestination({ id: "db", connection: CONNECTION, writer: factory });

    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ server: "db.internal", database: "Logs" }));
  });

  it("defaults to warn", () => {
    const destination = new TabularStoreDestination({
      id: "db",
      connection: CONNECTION,
      writer: createMockWriter,
    });

    expect(destination.minimumLevel).toBe("warn");
  });

  it("describes itself without credentials", () => {
    const destination = new TabularStoreDestination({
      id: "db",
      connection: CONNECTION,
      writer: createMockWriter,
    });

    expect(String(destination)).toBe("db: db.internal,Logs");
  });

  it("fails at construction for an invalid connection", () => {
    let caught: unknown;
    try {
      new TabularStoreDestination({ id: "db", connection: "Server=db", writer: createMockWriter });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONNECTION });
  });

  it("lets writer failures propagate to the caller", async () => {
    const writer = createMockWriter();
    writer.insert.mockRejectedValue(new Error("login failed"));
    const destination = new TabularStoreDestination({ id: "db", connection: CONNECTION, writer: () => writer });

    await expect(destination.write(makeEntry("error", "x"))).rejects.toThrow("login failed");
  });
});

describe("toLogRow", () => {
  it("writes the body, not the full line", () => {
    const row = toLogRow(makeEntry("critical", new Error("outer", { cause: new Error("inner") })));

    expect(row.message).toBe("outer\ninner\n");
    expect(row.level).toBe("Critical");
  });

  it("uses an explicit identity", () => {
    const row = toLogRow(makeEntry("info", "x"), { appName: "jobs", machineName: "m2", userName: "ops" });

    expect(row).toMatchObject({ app: "jobs", machine: "m2", username: "ops" });
  });
});
