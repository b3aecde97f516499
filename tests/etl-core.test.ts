/**
 * Unit tests for ETL pipeline with mock strategies.
 */
import { describe, test, expect } from "vitest";
import {
  ETLPipeline,
  type ExtractionStrategy,
  type LoadStrategy,
} from "../src/core/etl.js";
import {
  ExtractionFailedException,
  LoadFailedException,
  TransformFailedException,
} from "../src/core/exceptions.js";
import type {
  CategorizedRecord,
  CleanRecord,
  ExtractionResult,
  LoadResult,
  PageFailure,
  RawRecord,
} from "../src/core/types.js";
import { Categorizer } from "../src/transactions/categorize.js";
import { ArraySource, categorized, countRows, makeDb, rawRecord } from "./fixtures.js";

class MockExtraction implements ExtractionStrategy {
  constructor(
    private records: RawRecord[],
    private pageFailures: PageFailure[] = [],
  ) {}

  async extract(): Promise<ExtractionResult> {
    return { records: this.records, pagesFetched: 1, pageFailures: this.pageFailures };
  }
}

class FailingExtraction implements ExtractionStrategy {
  async extract(): Promise<ExtractionResult> {
    throw new Error("boom");
  }
}

class MockLoader implements LoadStrategy {
  received: CategorizedRecord[] = [];

  constructor(private result: LoadResult) {}

  async load(records: CategorizedRecord[]): Promise<LoadResult> {
    this.received = records;
    return this.result;
  }
}

class FailingLoader implements LoadStrategy {
  async load(): Promise<LoadResult> {
    throw new Error("disk full");
  }
}

class FailingCategorizer extends Categorizer {
  categorizeAll(_records: CleanRecord[]): CategorizedRecord[] {
    throw new Error("kaboom");
  }
}

const DIRTY_BATCH: RawRecord[] = [
  rawRecord(),
  rawRecord(),
  rawRecord({
    customer_id: "C2",
    product_id: "P2",
    transaction_date: "2024-01-06",
    transaction_amount: -10,
  }),
];

describe("ETLPipeline", () => {
  test("full run", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(DIRTY_BATCH),
      source: new ArraySource([]),
      db,
    });

    const summary = await pipeline.run({ runId: "run-1" });

    expect(summary).toMatchObject({
      runId: "run-1",
      status: "completed",
      extracted: 3,
      accepted: 2,
      duplicates: 1,
      rejected: 1,
      rejectedByReason: { negative_amount: 1 },
      loaded: 1,
      failedRecords: 0,
      batchesCommitted: 1,
      batchesFailed: 0,
      errors: [],
      customerTotals: [{ customerId: "C1", transactionCount: 1, totalAmount: 75 }],
    });
    expect(summary.elapsedMs).toBeGreaterThanOrEqual(0);
    expect(summary.finishedAt.getTime()).toBeGreaterThanOrEqual(summary.startedAt.getTime());
    expect(await countRows(db, "transactions")).toBe(1);
    await db.close();
  });

  test("generates a run id", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction([]),
      source: new ArraySource([]),
      db,
    });
    const first = await pipeline.run();
    const second = await pipeline.run();
    expect(first.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(second.runId).not.toBe(first.runId);
    expect(first.status).toBe("completed");
    await db.close();
  });

  test("only unique valid records reach the loader", async () => {
    const db = await makeDb();
    const loader = new MockLoader({
      loaded: 1,
      batchesCommitted: 1,
      batchFailures: [],
      aborted: false,
    });
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(DIRTY_BATCH),
      loader,
      source: new ArraySource([]),
      db,
    });
    await pipeline.run();

    expect(loader.received).toEqual([categorized()]);
    await db.close();
  });

  test("extract failure", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new FailingExtraction(),
      source: new ArraySource([]),
      db,
    });

    await expect(pipeline.extract({ runId: "r", startPage: 1, pageSize: 10, maxPages: 1 }))
      .rejects.toThrow(ExtractionFailedException);

    const summary = await pipeline.run();
    expect(summary.status).toBe("failed");
    expect(summary.errors).toEqual(["Extraction failed: boom"]);
    expect(summary.extracted).toBe(0);
    await db.close();
  });

  test("transform failure", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(DIRTY_BATCH),
      categorizer: new FailingCategorizer(),
      source: new ArraySource([]),
      db,
    });

    expect(() => pipeline.categorize([])).toThrow(TransformFailedException);

    const summary = await pipeline.run();
    expect(summary.status).toBe("failed");
    expect(summary.errors).toEqual(["Transform failed: kaboom"]);
    expect(summary.extracted).toBe(3);
    expect(summary.loaded).toBe(0);
    await db.close();
  });

  test("load failure", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(DIRTY_BATCH),
      loader: new FailingLoader(),
      source: new ArraySource([]),
      db,
    });

    await expect(pipeline.load([categorized()])).rejects.toThrow(LoadFailedException);

    const summary = await pipeline.run();
    expect(summary.status).toBe("failed");
    expect(summary.errors).toEqual(["Load failed: disk full"]);
    await db.close();
  });

  test("failed batches make the run partial", async () => {
    const db = await makeDb();
    const many = ["C1", "C2", "C3", "C4"].map((c) => rawRecord({ customer_id: c }));
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(many),
      loader: new MockLoader({
        loaded: 2,
        batchesCommitted: 1,
        batchFailures: [{ batch: 2, size: 2, kind: "constraint", message: "CHECK failed" }],
        aborted: false,
      }),
      source: new ArraySource([]),
      db,
    });

    const summary = await pipeline.run();
    expect(summary.status).toBe("partial");
    expect(summary.loaded).toBe(2);
    expect(summary.failedRecords).toBe(2);
    expect(summary.batchesFailed).toBe(1);
    expect(summary.errors).toEqual(["batch 2 (2 records): CHECK failed"]);
    await db.close();
  });

  test("page failures are reported", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction(
        [rawRecord()],
        [{ page: 2, attempts: 3, message: "connection reset" }],
      ),
      source: new ArraySource([]),
      db,
    });

    const summary = await pipeline.run();
    expect(summary.status).toBe("partial");
    expect(summary.loaded).toBe(1);
    expect(summary.pageFailures).toEqual([{ page: 2, attempts: 3, message: "connection reset" }]);
    expect(summary.errors).toEqual(["page 2: connection reset"]);
    await db.close();
  });

  test("an aborted load is reported", async () => {
    const db = await makeDb();
    const pipeline = new ETLPipeline({
      extraction: new MockExtraction([rawRecord()]),
      loader: new MockLoader({
        loaded: 0,
        batchesCommitted: 0,
        batchFailures: [{ batch: 1, size: 1, kind: "connection", message: "gone" }],
        aborted: true,
      }),
      source: new ArraySource([]),
      db,
    });

    const summary = await pipeline.run();
    expect(summary.status).toBe("failed");
    expect(summary.errors).toEqual([
      "batch 1 (1 records): gone",
      "run aborted: store unreachable",
    ]);
    await db.close();
  });

  test("missing collaborators", async () => {
    const db = await makeDb();
    const noSource = await new ETLPipeline({ db }).run();
    expect(noSource.status).toBe("failed");
    expect(noSource.errors).toEqual(["Record source not configured"]);

    const noDb = await new ETLPipeline({ source: new ArraySource([]) }).run();
    expect(noDb.status).toBe("failed");
    expect(noDb.errors).toEqual(["Database backend not configured"]);
    await db.close();
  });
});
