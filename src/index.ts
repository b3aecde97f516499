/**
 * spendline: batch ETL for transaction records.
 */
import {
  PipelineConfigSchema,
  buildDb,
  buildSource,
  parseConfig,
  type PipelineConfig,
} from "./config.js";
import { ETLPipeline } from "./core/etl.js";
import { silentLogger, type Logger } from "./core/logger.js";
import type { CustomerTotal, RunParams, RunSummary } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import {
  customerTotals,
  monthlyTrends,
  productCategoryTotals,
  topCustomers,
  type MonthlyTrend,
  type ProductCategoryTotal,
  type TopCustomer,
} from "./reports/queries.js";
import type { RecordSource } from "./source/backend.js";
import { PagedExtractionStrategy } from "./transactions/extraction.js";
import { TransactionLoader } from "./transactions/loader.js";

export { ConfigSchema, configFromEnv, parseConfig } from "./config.js";
export type { Config, PipelineConfig } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type { Logger } from "./core/logger.js";
export type { DatabaseBackend } from "./db/backend.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { PostgresBackend } from "./db/postgres.js";
export type { RecordSource, Page, PageRequest } from "./source/backend.js";
export { HttpRecordSource } from "./source/http.js";
export { FileRecordSource } from "./source/file.js";
export { AmountBands, Categorizer, DEFAULT_AMOUNT_BANDS } from "./transactions/categorize.js";
export type { AmountBand } from "./transactions/categorize.js";
export { cleanRecords } from "./transactions/cleaning.js";
export { aggregateByCustomer } from "./transactions/aggregate.js";

export class Spendline {
  private db: DatabaseBackend;
  private source: RecordSource | null;
  private pipelineConfig: PipelineConfig;
  private logger: Logger;

  constructor(
    db: DatabaseBackend,
    source: RecordSource | null = null,
    opts: { pipeline?: Partial<PipelineConfig>; logger?: Logger } = {},
  ) {
    this.db = db;
    this.source = source;
    this.pipelineConfig = PipelineConfigSchema.parse(opts.pipeline ?? {});
    this.logger = opts.logger ?? silentLogger;
  }

  /** Construct from a configuration object (validates with Zod). */
  static async fromConfig(
    config: unknown,
    opts: { logger?: Logger } = {},
  ): Promise<Spendline> {
    const parsed = parseConfig(config);
    const db = buildDb(parsed.db);
    const source = parsed.source ? buildSource(parsed.source) : null;
    const app = new Spendline(db, source, { pipeline: parsed.pipeline, logger: opts.logger });
    await app.initialize();
    return app;
  }

  /** Create the schema and seed the amount bands. Safe to call repeatedly. */
  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** One extract → clean → categorize → load run. Never throws. */
  async run(overrides: Partial<RunParams> = {}): Promise<RunSummary> {
    const cfg = this.pipelineConfig;
    const pipeline = new ETLPipeline({
      extraction: new PagedExtractionStrategy({
        attempts: cfg.attempts,
        retryDelayMs: cfg.retryDelayMs,
        maxConsecutiveFailures: cfg.maxConsecutiveFailures,
        logger: this.logger,
      }),
      loader: new TransactionLoader({ batchSize: cfg.batchSize, logger: this.logger }),
      source: this.source ?? undefined,
      db: this.db,
      logger: this.logger,
    });

    return pipeline.run({
      startPage: cfg.startPage,
      pageSize: cfg.pageSize,
      maxPages: cfg.maxPages,
      startDate: cfg.startDate,
      endDate: cfg.endDate,
      ...overrides,
    });
  }

  customerTotals(): Promise<CustomerTotal[]> {
    return customerTotals(this.db);
  }

  productCategoryTotals(): Promise<ProductCategoryTotal[]> {
    return productCategoryTotals(this.db);
  }

  topCustomers(limit = 5): Promise<TopCustomer[]> {
    return topCustomers(this.db, limit);
  }

  monthlyTrends(opts: { since?: string } = {}): Promise<MonthlyTrend[]> {
    return monthlyTrends(this.db, opts);
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // Expose for tests
  get _db(): DatabaseBackend {
    return this.db;
  }
}
