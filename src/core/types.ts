/**
 * Record, parameter and summary types shared across pipeline steps.
 */

/** A raw record exactly as the source delivered it. */
export type RawRecord = Record<string, unknown>;

/** Parameters passed through every ETL pipeline step of one run. */
export interface RunParams {
  runId: string;
  startDate?: string;
  endDate?: string;
  startPage: number;
  pageSize: number;
  maxPages: number;
}

/** A record that passed validation, with normalized fields. */
export interface CleanRecord {
  customerId: string;
  productId: string;
  productCategory: string;
  /** Calendar date, `YYYY-MM-DD`. */
  transactionDate: string;
  /** Non-negative, whole cents. */
  amountCents: number;
  transactionType: string;
  spendCategory: string;
}

/** A clean record with its derived attributes attached. */
export interface CategorizedRecord extends CleanRecord {
  amountCategory: string;
}

export type RejectionReason =
  | "missing_field"
  | "bad_date"
  | "invalid_amount"
  | "negative_amount"
  | "invalid_field";

export interface Rejection {
  /** Position of the record in the extracted stream. */
  index: number;
  reason: RejectionReason;
  detail: string;
  record: RawRecord;
}

export interface PageFailure {
  page: number;
  attempts: number;
  message: string;
}

export interface ExtractionResult {
  records: RawRecord[];
  pagesFetched: number;
  pageFailures: PageFailure[];
}

export type BatchFailureKind = "constraint" | "connection" | "unknown";

export interface BatchFailure {
  batch: number;
  size: number;
  kind: BatchFailureKind;
  message: string;
}

export interface LoadResult {
  loaded: number;
  batchesCommitted: number;
  batchFailures: BatchFailure[];
  /** Set when a connectivity failure stopped the remaining batches. */
  aborted: boolean;
}

export interface CustomerTotal {
  customerId: string;
  transactionCount: number;
  totalAmount: number;
}

export type RunStatus = "completed" | "partial" | "failed";

/** Result returned from ETLPipeline.run(). */
export interface RunSummary {
  runId: string;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date;
  elapsedMs: number;
  extracted: number;
  accepted: number;
  duplicates: number;
  rejected: number;
  rejectedByReason: Partial<Record<RejectionReason, number>>;
  loaded: number;
  failedRecords: number;
  batchesCommitted: number;
  batchesFailed: number;
  pageFailures: PageFailure[];
  batchFailures: BatchFailure[];
  customerTotals: CustomerTotal[];
  errors: string[];
}
