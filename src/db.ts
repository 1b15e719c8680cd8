/**
 * db.ts — PostgreSQL connection layer
 *
 * Each processor holds exactly one connection for its lifetime; nothing
 * here pools or shares clients. Processors only see the narrow
 * DbConnection interface so tests can substitute an in-process fake.
 *
 * Pattern:
 *   const conn = await openConnection(config.db);
 *   await initSchema(conn, STATS_TABLES.subject.schema);
 *   await withTransaction(conn, (c) => c.query(sql, params));
 *   await conn.end();
 */

import pg from "pg";
import type { QueryResultRow } from "pg";
import { ConnectionError } from "./errors.js";
import { log } from "./logger.js";

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface DbQueryResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

/** The subset of a pg client the loader relies on. */
export interface DbConnection {
  query(text: string, values?: unknown[]): Promise<DbQueryResult>;
  end(): Promise<void>;
}

export type ConnectFn = (config: DbConfig) => Promise<DbConnection>;

export type { QueryResultRow };

/** Client options for a DbConfig. */
export function connectionConfig(config: DbConfig): pg.ClientConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    connectionTimeoutMillis: 10_000,
    application_name: "archive-stats-loader",
  };
}

/**
 * Open one dedicated connection.
 * Throws ConnectionError when the server is unreachable or rejects the login.
 */
export async function openConnection(config: DbConfig): Promise<DbConnection> {
  const client = new pg.Client(connectionConfig(config));

  // Unhandled client error events crash the process
  client.on("error", (err) => {
    log.db.error({ err: err.message }, "connection error");
  });

  try {
    await client.connect();
  } catch (err) {
    await client.end().catch((endErr: unknown) => {
      log.db.debug({ err: endErr instanceof Error ? endErr.message : String(endErr) }, "close after failed connect");
    });
    throw new ConnectionError(`${config.host}:${config.port}`, config.database, { cause: err });
  }

  return {
    async query(text: string, values?: unknown[]) {
      const result = await client.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    end: () => client.end(),
  };
}

/**
 * Run a sequence of DDL statements inside a single transaction.
 */
export async function initSchema(conn: DbConnection, statements: readonly string[]): Promise<void> {
  await withTransaction(conn, async (c) => {
    for (const stmt of statements) {
      await c.query(stmt);
    }
  });
}

/**
 * Execute a callback inside a transaction.
 * Commits on success, rolls back on error. A failed ROLLBACK (dropped
 * connection) is logged and the original error is rethrown.
 */
export async function withTransaction<T>(
  conn: DbConnection,
  fn: (conn: DbConnection) => Promise<T>,
): Promise<T> {
  await conn.query("BEGIN");
  try {
    const result = await fn(conn);
    await conn.query("COMMIT");
    return result;
  } catch (e) {
    try {
      await conn.query("ROLLBACK");
    } catch (rollbackErr) {
      log.db.warn({ err: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) }, "rollback failed");
    }
    throw e;
  }
}
