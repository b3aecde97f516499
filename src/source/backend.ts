/**
 * Abstract record source interface.
 */
import type { RawRecord } from "../core/types.js";

export interface PageRequest {
  /** 1-based page number. */
  page: number;
  pageSize: number;
  startDate?: string;
  endDate?: string;
}

export interface Page {
  records: RawRecord[];
  /** Set when the source says whether another page follows. */
  hasMore?: boolean;
}

export interface RecordSource {
  /** Fetch one page. Throws PageFetchError on failure. */
  fetchPage(request: PageRequest): Promise<Page>;
}
