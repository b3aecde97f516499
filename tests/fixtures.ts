/**
 * Shared test fixtures: raw records, in-process record sources, a fresh
 * in-memory store.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { PageFetchError } from "../src/core/exceptions.js";
import type { CategorizedRecord, RawRecord } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import type { DatabaseBackend } from "../src/db/backend.js";
import type { Page, PageRequest, RecordSource } from "../src/source/backend.js";

// ---------------------------------------------------------------------------
// Raw records
// ---------------------------------------------------------------------------

export function rawRecord(overrides: RawRecord = {}): RawRecord {
  return {
    customer_id: "C1",
    product_id: "P1",
    product_category: "food",
    transaction_date: "2024-01-05",
    transaction_amount: 75.0,
    transaction_type: "purchase",
    spend_category: "grocery",
    ...overrides,
  };
}

export function categorized(overrides: Partial<CategorizedRecord> = {}): CategorizedRecord {
  return {
    customerId: "C1",
    productId: "P1",
    productCategory: "food",
    transactionDate: "2024-01-05",
    amountCents: 7500,
    transactionType: "purchase",
    spendCategory: "grocery",
    amountCategory: "medium",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Record sources
// ---------------------------------------------------------------------------

/**
 * Serves `records` in `pageSize` slices. `failures` maps a page number to how
 * many leading attempts fail (Infinity: always).
 */
export class ArraySource implements RecordSource {
  readonly requests: PageRequest[] = [];
  private records: RawRecord[];
  private failures: Map<number, number>;
  private status: number | undefined;

  constructor(
    records: RawRecord[],
    opts: { failures?: Record<number, number>; status?: number } = {},
  ) {
    this.records = records;
    this.failures = new Map(
      Object.entries(opts.failures ?? {}).map(([page, n]): [number, number] => [Number(page), n]),
    );
    this.status = opts.status;
  }

  async fetchPage(request: PageRequest): Promise<Page> {
    this.requests.push(request);
    const remaining = this.failures.get(request.page) ?? 0;
    if (remaining > 0) {
      this.failures.set(request.page, remaining - 1);
      throw new PageFetchError(request.page, "connection reset", { status: this.status });
    }
    const start = (request.page - 1) * request.pageSize;
    return { records: this.records.slice(start, start + request.pageSize) };
  }

  attemptsFor(page: number): number {
    return this.requests.filter((r) => r.page === page).length;
  }
}

// ---------------------------------------------------------------------------
// Store helpers
// ---------------------------------------------------------------------------

export async function makeDb(): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  return db;
}

export async function countRows(db: DatabaseBackend, table: string): Promise<number> {
  const row = await db.queryOne<{ n: number }>(`SELECT COUNT(*) AS n FROM ${table}`);
  return row?.n ?? 0;
}

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "spendline-test-"));
}
