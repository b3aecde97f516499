/**
 * HTTP record source: one request per page against the transactions API.
 */
import { PageFetchError, errorMessage } from "../core/exceptions.js";
import { PageResponseSchema } from "../transactions/schemas.js";
import type { Page, PageRequest, RecordSource } from "./backend.js";

export interface HttpSourceConfig {
  url: string;
  apiKey?: string;
  method?: "GET" | "POST";
  timeoutMs?: number;
  headers?: Record<string, string>;
}

type Fetch = typeof fetch;

export class HttpRecordSource implements RecordSource {
  private config: HttpSourceConfig;
  private fetchFn: Fetch;

  constructor(config: HttpSourceConfig, fetchFn: Fetch = fetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  async fetchPage(request: PageRequest): Promise<Page> {
    const { page } = request;
    let response: Response;
    try {
      response = await this.fetchFn(this.requestUrl(request), this.requestInit(request));
    } catch (err) {
      throw new PageFetchError(page, errorMessage(err), { cause: err });
    }

    if (!response.ok) {
      throw new PageFetchError(page, response.statusText || "request failed", {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new PageFetchError(page, `invalid JSON body: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = PageResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PageFetchError(page, `unexpected payload: ${parsed.error.message}`, {
        retryable: false,
      });
    }

    const payload = parsed.data;
    if (Array.isArray(payload)) return { records: payload };

    const records = payload.data ?? payload.transactions ?? payload.records ?? [];
    if (payload.has_more !== undefined) return { records, hasMore: payload.has_more };
    if (payload.next_page !== undefined) {
      return { records, hasMore: payload.next_page !== null };
    }
    return { records };
  }

  private method(): "GET" | "POST" {
    return this.config.method ?? "POST";
  }

  private requestUrl(request: PageRequest): string {
    if (this.method() === "POST") return this.config.url;
    const url = new URL(this.config.url);
    for (const [key, value] of Object.entries(this.queryParams(request))) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private requestInit(request: PageRequest): RequestInit {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...this.config.headers,
    };
    if (this.config.apiKey) headers["x-api-key"] = this.config.apiKey;

    return {
      method: this.method(),
      headers,
      body: this.method() === "POST" ? JSON.stringify(this.queryParams(request)) : undefined,
      signal: AbortSignal.timeout(this.config.timeoutMs ?? 30_000),
    };
  }

  private queryParams(request: PageRequest): Record<string, string | number> {
    const params: Record<string, string | number> = {
      page: request.page,
      page_size: request.pageSize,
    };
    if (request.startDate) params.start_date = request.startDate;
    if (request.endDate) params.end_date = request.endDate;
    return params;
  }
}
