/**
 * PostgreSQL database backend using postgres-js.
 *
 * Transactions run on a reserved connection so every statement issued by the
 * callback goes through the same session; nested calls become savepoints.
 */
import postgres from "postgres";
import {
  StoreConnectionError,
  StoreConstraintError,
  errorMessage,
  type ConstraintKind,
} from "../core/exceptions.js";
import { toPositional, type DatabaseBackend, type Row, type SqlParam } from "./backend.js";
import { POSTGRES_SCHEMA_SQL } from "./schema.js";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "CONNECT_TIMEOUT",
  "57P01", // admin_shutdown
  "3D000", // invalid_catalog_name
  "28P01", // invalid_password
]);

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
  "23505": "unique",
  "23503": "foreign_key",
  "23514": "check",
  "23502": "not_null",
};

function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}

/** Map driver errors onto the store error taxonomy. */
export function translatePostgresError(err: unknown): unknown {
  const code = errorCode(err);
  if (code === null) return err;
  if (code.startsWith("23")) {
    return new StoreConstraintError(CONSTRAINT_KINDS[code] ?? "other", errorMessage(err), err);
  }
  // Class 22: a value the column cannot hold (too long, out of range).
  if (code.startsWith("22")) {
    return new StoreConstraintError("invalid_value", errorMessage(err), err);
  }
  if (code.startsWith("08") || CONNECTION_CODES.has(code)) {
    return new StoreConnectionError(errorMessage(err), err);
  }
  return err;
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  private sql: postgres.Sql;
  private conn: postgres.ReservedSql | null = null;
  private depth = 0;

  constructor(connectionString: string, options: { max?: number } = {}) {
    this.sql = postgres(connectionString, {
      max: options.max ?? 1,
      onnotice: () => {},
    });
  }

  async initialize(): Promise<void> {
    await this.run(POSTGRES_SCHEMA_SQL);
  }

  async ping(): Promise<void> {
    await this.run("SELECT 1");
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    await this.run(sql, params);
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    return this.run<T>(sql, params);
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const rows = await this.run<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.conn) return this.savepoint(this.conn, fn);

    const conn = await this.reserve();
    this.conn = conn;
    try {
      await this.on(conn, "BEGIN");
      const result = await fn();
      await this.on(conn, "COMMIT");
      return result;
    } catch (err) {
      await this.rollback(conn, "ROLLBACK", err);
      throw translatePostgresError(err);
    } finally {
      this.conn = null;
      conn.release();
    }
  }

  async close(): Promise<void> {
    await this.sql.end();
  }

  private async savepoint<T>(conn: postgres.ReservedSql, fn: () => Promise<T>): Promise<T> {
    const name = `sp_${++this.depth}`;
    try {
      await this.on(conn, `SAVEPOINT ${name}`);
      const result = await fn();
      await this.on(conn, `RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (err) {
      await this.rollback(conn, `ROLLBACK TO SAVEPOINT ${name}`, err);
      throw translatePostgresError(err);
    } finally {
      this.depth--;
    }
  }

  private async rollback(
    conn: postgres.ReservedSql,
    statement: string,
    original: unknown,
  ): Promise<void> {
    try {
      await conn.unsafe(statement);
    } catch (rollbackErr) {
      throw new StoreConnectionError(
        `${statement} failed after: ${errorMessage(original)}`,
        rollbackErr,
      );
    }
  }

  private async reserve(): Promise<postgres.ReservedSql> {
    try {
      return await this.sql.reserve();
    } catch (err) {
      throw translatePostgresError(err);
    }
  }

  private async on(conn: postgres.ReservedSql, statement: string): Promise<void> {
    try {
      await conn.unsafe(statement);
    } catch (err) {
      throw translatePostgresError(err);
    }
  }

  private async run<T extends Row = Row>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    const executor: postgres.Sql = this.conn ?? this.sql;
    try {
      return await executor.unsafe<T[]>(toPositional(sql), params);
    } catch (err) {
      throw translatePostgresError(err);
    }
  }
}
