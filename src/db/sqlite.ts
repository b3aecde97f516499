/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import {
  StoreConnectionError,
  StoreConstraintError,
  type ConstraintKind,
} from "../core/exceptions.js";
import type { DatabaseBackend, Row, SqlParam } from "./backend.js";
import { SQLITE_SCHEMA_SQL } from "./schema.js";

const CONNECTION_CODES = ["SQLITE_CANTOPEN", "SQLITE_IOERR", "SQLITE_NOTADB", "SQLITE_CORRUPT"];

function constraintKind(code: string): ConstraintKind {
  switch (code) {
    case "SQLITE_CONSTRAINT_UNIQUE":
    case "SQLITE_CONSTRAINT_PRIMARYKEY":
      return "unique";
    case "SQLITE_CONSTRAINT_FOREIGNKEY":
      return "foreign_key";
    case "SQLITE_CONSTRAINT_CHECK":
      return "check";
    case "SQLITE_CONSTRAINT_NOTNULL":
      return "not_null";
    default:
      return "other";
  }
}

/** Map driver errors onto the store error taxonomy. */
export function translateSqliteError(err: unknown): unknown {
  if (err instanceof Database.SqliteError) {
    if (err.code.startsWith("SQLITE_CONSTRAINT")) {
      return new StoreConstraintError(constraintKind(err.code), err.message, err);
    }
    if (CONNECTION_CODES.some((c) => err.code.startsWith(c))) {
      return new StoreConnectionError(err.message, err);
    }
  }
  if (err instanceof TypeError && err.message.includes("connection is not open")) {
    return new StoreConnectionError(err.message, err);
  }
  return err;
}

function open(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (err) {
    throw new StoreConnectionError(`Cannot open SQLite database at ${path}`, err);
  }
}

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect = "sqlite" as const;
  private db: Database.Database;
  private depth = 0;

  constructor(path: string = ":memory:") {
    this.db = open(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.exec(SQLITE_SCHEMA_SQL);
  }

  async ping(): Promise<void> {
    this.guard(() => this.db.prepare("SELECT 1").get());
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    this.guard(() => this.db.prepare(sql).run(...params));
  }

  async query<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    return this.guard(() => this.db.prepare(sql).all(...params) as T[]);
  }

  async queryOne<T extends Row = Row>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const row = this.guard(() => this.db.prepare(sql).get(...params));
    return (row as T | undefined) ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const savepoint = this.depth === 0 ? null : `sp_${this.depth}`;
    this.exec(savepoint ? `SAVEPOINT ${savepoint}` : "BEGIN");
    this.depth++;
    try {
      const result = await fn();
      this.exec(savepoint ? `RELEASE SAVEPOINT ${savepoint}` : "COMMIT");
      return result;
    } catch (err) {
      if (this.db.open && (savepoint || this.db.inTransaction)) {
        this.exec(
          savepoint
            ? `ROLLBACK TO SAVEPOINT ${savepoint}; RELEASE SAVEPOINT ${savepoint}`
            : "ROLLBACK",
        );
      }
      throw translateSqliteError(err);
    } finally {
      this.depth--;
    }
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }

  private exec(sql: string): void {
    this.guard(() => this.db.exec(sql));
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw translateSqliteError(err);
    }
  }
}
