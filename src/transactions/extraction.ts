/**
 * Paginated extraction with bounded per-page retries.
 */
import pRetry, { AbortError } from "p-retry";

import type { ExtractionStrategy } from "../core/etl.js";
import { PageFetchError, errorMessage } from "../core/exceptions.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type { ExtractionResult, PageFailure, RawRecord, RunParams } from "../core/types.js";
import type { Page, RecordSource } from "../source/backend.js";

export interface ExtractionOptions {
  /** Tries per page, first one included. */
  attempts?: number;
  retryDelayMs?: number;
  /** Stop after this many pages in a row have failed. */
  maxConsecutiveFailures?: number;
  logger?: Logger;
}

/**
 * Walks a record source page by page. A page that still fails after its
 * retries is recorded and skipped; records are kept only from pages that
 * succeeded.
 */
export class PagedExtractionStrategy implements ExtractionStrategy {
  private attempts: number;
  private retryDelayMs: number;
  private maxConsecutiveFailures: number;
  private logger: Logger;

  constructor(opts: ExtractionOptions = {}) {
    this.attempts = Math.max(1, opts.attempts ?? 3);
    this.retryDelayMs = opts.retryDelayMs ?? 250;
    this.maxConsecutiveFailures = Math.max(1, opts.maxConsecutiveFailures ?? 3);
    this.logger = opts.logger ?? silentLogger;
  }

  async extract(params: RunParams, source: RecordSource): Promise<ExtractionResult> {
    const records: RawRecord[] = [];
    const pageFailures: PageFailure[] = [];
    let pagesFetched = 0;
    let consecutiveFailures = 0;

    for (let n = 0; n < params.maxPages; n++) {
      const pageNumber = params.startPage + n;
      const outcome = await this.fetchWithRetry(source, params, pageNumber);

      if ("failure" in outcome) {
        pageFailures.push(outcome.failure);
        consecutiveFailures++;
        this.logger.warn(
          `page ${pageNumber} skipped after ${outcome.failure.attempts} attempt(s): ${outcome.failure.message}`,
        );
        if (consecutiveFailures >= this.maxConsecutiveFailures) {
          this.logger.error(`${consecutiveFailures} pages failed in a row; stopping extraction`);
          break;
        }
        continue;
      }

      consecutiveFailures = 0;
      pagesFetched++;
      const { page } = outcome;
      records.push(...page.records);

      if (page.records.length === 0) break;
      const hasMore = page.hasMore ?? page.records.length >= params.pageSize;
      if (!hasMore) break;
    }

    return { records, pagesFetched, pageFailures };
  }

  private async fetchWithRetry(
    source: RecordSource,
    params: RunParams,
    pageNumber: number,
  ): Promise<{ page: Page } | { failure: PageFailure }> {
    let attempts = 0;
    try {
      const page = await pRetry(
        async () => {
          attempts++;
          try {
            return await source.fetchPage({
              page: pageNumber,
              pageSize: params.pageSize,
              startDate: params.startDate,
              endDate: params.endDate,
            });
          } catch (err) {
            if (err instanceof PageFetchError && !err.retryable) throw new AbortError(err);
            throw err;
          }
        },
        {
          retries: this.attempts - 1,
          minTimeout: this.retryDelayMs,
          maxTimeout: this.retryDelayMs,
          factor: 1,
          onFailedAttempt: (error) => {
            if (error.retriesLeft > 0) {
              this.logger.warn(
                `page ${pageNumber} attempt ${error.attemptNumber} failed: ${error.message}`,
              );
            }
          },
        },
      );
      return { page };
    } catch (err) {
      return { failure: { page: pageNumber, attempts, message: errorMessage(err) } };
    }
  }
}
