/**
 * Transaction loader: resolves dimension keys and bulk-inserts fact rows,
 * one transaction per batch.
 */
import type { LoadStrategy } from "../core/etl.js";
import {
  StoreConnectionError,
  StoreConstraintError,
  errorMessage,
} from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type {
  BatchFailure,
  BatchFailureKind,
  CategorizedRecord,
  LoadResult,
} from "../core/types.js";
import type { DatabaseBackend, SqlParam } from "../db/backend.js";
import { AmountBands } from "./categorize.js";
import { DimensionResolver } from "./dimensions.js";
import { centsToDecimal } from "./money.js";

export const DEFAULT_BATCH_SIZE = 500;
const ROWS_PER_INSERT = 100;

const FACT_COLUMNS = [
  "customer_id",
  "product_id",
  "transaction_date",
  "transaction_amount",
  "transaction_type_id",
  "spend_category_id",
  "amount_category_id",
];

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

function insertSql(rows: number): string {
  const tuple = `(${FACT_COLUMNS.map(() => "?").join(", ")})`;
  return `INSERT INTO transactions (${FACT_COLUMNS.join(", ")}) VALUES ${Array(rows).fill(tuple).join(", ")}`;
}

function failureKind(err: unknown): BatchFailureKind {
  if (err instanceof StoreConnectionError) return "connection";
  if (err instanceof StoreConstraintError) return "constraint";
  return "unknown";
}

export class TransactionLoader implements LoadStrategy {
  private batchSize: number;
  private bands: AmountBands;
  private logger: Logger;

  constructor(
    opts: { batchSize?: number; bands?: AmountBands; logger?: Logger } = {},
  ) {
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${this.batchSize}`);
    }
    this.bands = opts.bands ?? new AmountBands();
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Load records batch by batch. A failed batch is rolled back entirely and
   * reported; later batches still run unless the store became unreachable.
   */
  async load(records: CategorizedRecord[], db: DatabaseBackend): Promise<LoadResult> {
    const result: LoadResult = {
      loaded: 0,
      batchesCommitted: 0,
      batchFailures: [],
      aborted: false,
    };

    const batches = chunk(records, this.batchSize);
    for (const [i, batch] of batches.entries()) {
      const number = i + 1;
      try {
        const count = await this.loadBatch(batch, db);
        result.loaded += count;
        result.batchesCommitted++;
        this.logger.info(`batch ${number}/${batches.length}: ${count} transactions committed`);
      } catch (err) {
        const failure: BatchFailure = {
          batch: number,
          size: batch.length,
          kind: failureKind(err),
          message: errorMessage(err),
        };
        result.batchFailures.push(failure);
        this.logger.error(
          `batch ${number}/${batches.length} rolled back (${failure.kind}): ${failure.message}`,
        );
        if (failure.kind === "connection") {
          result.aborted = true;
          const skipped = batches.length - number;
          if (skipped > 0) this.logger.error(`store unreachable; ${skipped} batch(es) not attempted`);
          break;
        }
      }
    }

    return result;
  }

  /** Resolve dimensions then insert facts, all inside one transaction. */
  async loadBatch(records: CategorizedRecord[], db: DatabaseBackend): Promise<number> {
    if (records.length === 0) return 0;

    return db.transaction(async () => {
      const dims = new DimensionResolver(db);
      const rows: SqlParam[][] = [];

      for (const r of records) {
        const customerId = await dims.customer(r.customerId);
        const productId = await dims.product(r.productId, r.productCategory);
        const typeId = await dims.transactionType(r.transactionType);
        const spendId = await dims.spendCategory(r.spendCategory);
        const amountId = await dims.amountCategory(this.bands.byName(r.amountCategory));
        rows.push([
          customerId,
          productId,
          r.transactionDate,
          centsToDecimal(r.amountCents),
          typeId,
          spendId,
          amountId,
        ]);
      }

      for (const slice of chunk(rows, ROWS_PER_INSERT)) {
        await db.execute(insertSql(slice.length), slice.flat());
      }
      return rows.length;
    });
  }
}
