/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL, no ORM. Statements are written with `?`
 * placeholders; backends translate them for their driver.
 */
export type SqlParam = string | number | null;

export type Row = Record<string, unknown>;

export type Dialect = "sqlite" | "postgres";

export interface DatabaseBackend {
  readonly dialect: Dialect;

  /** Create tables, indexes and the totals view; seed the amount bands. */
  initialize(): Promise<void>;

  /** Round trip to the store. Throws StoreConnectionError when unreachable. */
  ping(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlParam[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T extends Row = Row>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /** Run a SELECT (or INSERT … RETURNING) and return the first row, or null. */
  queryOne<T extends Row = Row>(
    sql: string,
    params?: SqlParam[],
  ): Promise<T | null>;

  /**
   * Execute `fn` inside a transaction. Called while a transaction is already
   * open, it runs `fn` inside a savepoint instead, so a failure rolls back
   * only the work done by `fn`.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}

/** Rewrite `?` placeholders to `$1, $2, …`, leaving quoted literals alone. */
export function toPositional(sql: string): string {
  let out = "";
  let n = 0;
  let quoted = false;
  for (const ch of sql) {
    if (ch === "'") quoted = !quoted;
    if (ch === "?" && !quoted) {
      n++;
      out += `$${n}`;
    } else {
      out += ch;
    }
  }
  return out;
}
