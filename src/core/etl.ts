/**
 * ETL pipeline core: strategy interfaces and the async ETLPipeline runner.
 */
import { randomUUID } from "node:crypto";

import type { DatabaseBackend } from "../db/backend.js";
import type { RecordSource } from "../source/backend.js";
import { aggregateByCustomer, toCustomerTotals } from "../transactions/aggregate.js";
import { Categorizer } from "../transactions/categorize.js";
import { cleanRecords, countByReason, type CleanResult } from "../transactions/cleaning.js";
import { PagedExtractionStrategy } from "../transactions/extraction.js";
import { TransactionLoader } from "../transactions/loader.js";
import {
  ExtractionFailedException,
  LoadFailedException,
  TransformFailedException,
  errorMessage,
} from "./exceptions.js";
import { silentLogger, type Logger } from "./logger.js";
import type {
  CategorizedRecord,
  CleanRecord,
  ExtractionResult,
  LoadResult,
  RawRecord,
  RunParams,
  RunStatus,
  RunSummary,
} from "./types.js";

// ---------------------------------------------------------------------------
// Strategy interfaces
// ---------------------------------------------------------------------------

/** Reads raw records from a record source. */
export interface ExtractionStrategy {
  extract(params: RunParams, source: RecordSource): Promise<ExtractionResult>;
}

/** Writes categorized records to the store. */
export interface LoadStrategy {
  load(records: CategorizedRecord[], db: DatabaseBackend): Promise<LoadResult>;
}

export const DEFAULT_RUN_PARAMS: Omit<RunParams, "runId"> = {
  startPage: 1,
  pageSize: 100,
  maxPages: 1000,
};

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export class ETLPipeline {
  private extraction: ExtractionStrategy;
  private categorizer: Categorizer;
  private loader: LoadStrategy;
  private source: RecordSource | null;
  private db: DatabaseBackend | null;
  private logger: Logger;

  constructor(opts: {
    extraction?: ExtractionStrategy;
    categorizer?: Categorizer;
    loader?: LoadStrategy;
    source?: RecordSource;
    db?: DatabaseBackend;
    logger?: Logger;
  }) {
    this.logger = opts.logger ?? silentLogger;
    this.extraction =
      opts.extraction ?? new PagedExtractionStrategy({ logger: this.logger });
    this.categorizer = opts.categorizer ?? new Categorizer();
    this.loader = opts.loader ?? new TransactionLoader({ logger: this.logger });
    this.source = opts.source ?? null;
    this.db = opts.db ?? null;
  }

  /** Step 1: Pull raw records from the source, page by page. */
  async extract(params: RunParams): Promise<ExtractionResult> {
    if (!this.source) throw new Error("Record source not configured");
    try {
      return await this.extraction.extract(params, this.source);
    } catch (err) {
      throw new ExtractionFailedException(errorMessage(err));
    }
  }

  /** Step 2: Validate, repair and deduplicate raw records. */
  clean(records: RawRecord[]): CleanResult {
    try {
      return cleanRecords(records);
    } catch (err) {
      throw new TransformFailedException(errorMessage(err));
    }
  }

  /** Step 3: Attach amount bands and default lookup names. */
  categorize(records: CleanRecord[]): CategorizedRecord[] {
    try {
      return this.categorizer.categorizeAll(records);
    } catch (err) {
      throw new TransformFailedException(errorMessage(err));
    }
  }

  /** Step 4: Write fact rows, one transaction per batch. */
  async load(records: CategorizedRecord[]): Promise<LoadResult> {
    if (!this.db) throw new Error("Database backend not configured");
    try {
      return await this.loader.load(records, this.db);
    } catch (err) {
      throw new LoadFailedException(errorMessage(err), err);
    }
  }

  /**
   * Run extract → clean → categorize → load. Never throws: every failure is
   * captured in the returned summary.
   */
  async run(params: Partial<RunParams> = {}): Promise<RunSummary> {
    const runParams: RunParams = {
      ...DEFAULT_RUN_PARAMS,
      ...params,
      runId: params.runId ?? randomUUID(),
    };
    const startedAt = new Date();
    const summary = emptySummary(runParams.runId, startedAt);

    try {
      if (!this.db) throw new Error("Database backend not configured");
      await this.db.ping();

      this.logger.info(`run ${runParams.runId}: extracting`);
      const extraction = await this.extract(runParams);
      summary.extracted = extraction.records.length;
      summary.pageFailures = extraction.pageFailures;
      for (const f of extraction.pageFailures) {
        summary.errors.push(`page ${f.page}: ${f.message}`);
      }

      this.logger.info(`run ${runParams.runId}: cleaning ${summary.extracted} records`);
      const cleaned = this.clean(extraction.records);
      summary.accepted = cleaned.accepted.length + cleaned.duplicates.length;
      summary.duplicates = cleaned.duplicates.length;
      summary.rejected = cleaned.rejected.length;
      summary.rejectedByReason = countByReason(cleaned.rejected);

      const categorized = this.categorize(cleaned.accepted);
      summary.customerTotals = toCustomerTotals(aggregateByCustomer(categorized));

      this.logger.info(`run ${runParams.runId}: loading ${categorized.length} records`);
      const load = await this.load(categorized);
      summary.loaded = load.loaded;
      summary.failedRecords = categorized.length - load.loaded;
      summary.batchesCommitted = load.batchesCommitted;
      summary.batchesFailed = load.batchFailures.length;
      summary.batchFailures = load.batchFailures;
      for (const f of load.batchFailures) {
        summary.errors.push(`batch ${f.batch} (${f.size} records): ${f.message}`);
      }
      if (load.aborted) summary.errors.push("run aborted: store unreachable");
    } catch (err) {
      this.logger.error(`run ${runParams.runId} failed: ${errorMessage(err)}`);
      summary.errors.push(errorMessage(err));
    }

    const finishedAt = new Date();
    summary.finishedAt = finishedAt;
    summary.elapsedMs = finishedAt.getTime() - startedAt.getTime();
    summary.status = runStatus(summary);
    return summary;
  }
}

function emptySummary(runId: string, startedAt: Date): RunSummary {
  return {
    runId,
    status: "completed",
    startedAt,
    finishedAt: startedAt,
    elapsedMs: 0,
    extracted: 0,
    accepted: 0,
    duplicates: 0,
    rejected: 0,
    rejectedByReason: {},
    loaded: 0,
    failedRecords: 0,
    batchesCommitted: 0,
    batchesFailed: 0,
    pageFailures: [],
    batchFailures: [],
    customerTotals: [],
    errors: [],
  };
}

function runStatus(summary: RunSummary): RunStatus {
  if (summary.errors.length === 0) return "completed";
  return summary.loaded === 0 ? "failed" : "partial";
}
