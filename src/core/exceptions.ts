/**
 * Custom exceptions for ETL pipeline operations.
 */

export class ExtractionFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Extraction failed: ${message}` : "Extraction failed");
    this.name = "ExtractionFailedException";
  }
}

export class TransformFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Transform failed: ${message}` : "Transform failed");
    this.name = "TransformFailedException";
  }
}

export class LoadFailedException extends Error {
  constructor(message?: string, cause?: unknown) {
    super(message ? `Load failed: ${message}` : "Load failed", { cause });
    this.name = "LoadFailedException";
  }
}

/** 408 and 429 are worth retrying; any other 4xx will fail the same way again. */
function isRetryableStatus(status: number | null): boolean {
  if (status === null) return true;
  if (status === 408 || status === 429) return true;
  return status >= 500;
}

/** A page could not be fetched from the record source. */
export class PageFetchError extends Error {
  readonly page: number;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    page: number,
    message: string,
    opts: { status?: number; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(opts.status === undefined ? message : `HTTP ${opts.status}: ${message}`, {
      cause: opts.cause,
    });
    this.name = "PageFetchError";
    this.page = page;
    this.status = opts.status ?? null;
    this.retryable = opts.retryable ?? isRetryableStatus(this.status);
  }
}

export type ConstraintKind =
  | "unique"
  | "foreign_key"
  | "check"
  | "not_null"
  | "invalid_value"
  | "other";

/** The store rejected a write. Aborts the current batch only. */
export class StoreConstraintError extends Error {
  readonly kind: ConstraintKind;

  constructor(kind: ConstraintKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StoreConstraintError";
    this.kind = kind;
  }
}

/** The store cannot be reached. Aborts the whole run. */
export class StoreConnectionError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StoreConnectionError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
