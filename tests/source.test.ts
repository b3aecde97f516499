/**
 * Unit tests for the HTTP and file record sources.
 */
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, test, expect } from "vitest";

import { PageFetchError } from "../src/core/exceptions.js";
import type { RecordSource } from "../src/source/backend.js";
import { FileRecordSource } from "../src/source/file.js";
import { HttpRecordSource, type HttpSourceConfig } from "../src/source/http.js";
import { makeTmpDir, rawRecord } from "./fixtures.js";

const URL_BASE = "https://api.example.test/transactions";

function fakeFetch(respond: () => Response | Promise<Response>) {
  const calls: { url: string; init: RequestInit | undefined }[] = [];
  const fn: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
  return { fn, calls };
}

function json(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

async function fetchError(source: RecordSource): Promise<PageFetchError> {
  try {
    await source.fetchPage({ page: 1, pageSize: 10 });
  } catch (err) {
    if (err instanceof PageFetchError) return err;
    throw err;
  }
  throw new Error("expected fetchPage to fail");
}

function httpSource(
  respond: () => Response | Promise<Response>,
  config: Partial<HttpSourceConfig> = {},
) {
  const fake = fakeFetch(respond);
  const source = new HttpRecordSource(
    { url: URL_BASE, apiKey: "test-secret", ...config },
    fake.fn,
  );
  return { source, calls: fake.calls };
}

describe("HttpRecordSource", () => {
  test("POSTs the page request as JSON", async () => {
    const { source, calls } = httpSource(() => json([rawRecord()]));
    const page = await source.fetchPage({
      page: 2,
      pageSize: 50,
      startDate: "2024-01-01",
      endDate: "2024-01-31",
    });

    expect(page).toEqual({ records: [rawRecord()] });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe(URL_BASE);
    expect(calls[0].init?.method).toBe("POST");
    expect(calls[0].init?.body).toBe(
      '{"page":2,"page_size":50,"start_date":"2024-01-01","end_date":"2024-01-31"}',
    );
    expect(calls[0].init?.headers).toEqual({
      "Content-Type": "application/json",
      "x-api-key": "test-secret",
    });
  });

  test("GET puts the page request in the query string", async () => {
    const { source, calls } = httpSource(() => json([]), { method: "GET", apiKey: undefined });
    await source.fetchPage({ page: 1, pageSize: 10 });

    expect(calls[0].url).toBe(`${URL_BASE}?page=1&page_size=10`);
    expect(calls[0].init?.method).toBe("GET");
    expect(calls[0].init?.body).toBeUndefined();
    expect(calls[0].init?.headers).toEqual({ "Content-Type": "application/json" });
  });

  test("extra headers are sent", async () => {
    const { source, calls } = httpSource(() => json([]), { headers: { "X-Tenant": "acme" } });
    await source.fetchPage({ page: 1, pageSize: 10 });
    expect(calls[0].init?.headers).toEqual({
      "Content-Type": "application/json",
      "X-Tenant": "acme",
      "x-api-key": "test-secret",
    });
  });

  test("envelopes", async () => {
    const record = rawRecord();

    const withHasMore = httpSource(() => json({ data: [record], has_more: true })).source;
    expect(await withHasMore.fetchPage({ page: 1, pageSize: 1 })).toEqual({
      records: [record],
      hasMore: true,
    });

    const lastPage = httpSource(() => json({ transactions: [record], next_page: null })).source;
    expect(await lastPage.fetchPage({ page: 1, pageSize: 1 })).toEqual({
      records: [record],
      hasMore: false,
    });

    const plain = httpSource(() => json({ records: [record] })).source;
    expect(await plain.fetchPage({ page: 1, pageSize: 1 })).toEqual({ records: [record] });

    const empty = httpSource(() => json({ total: 0 })).source;
    expect(await empty.fetchPage({ page: 1, pageSize: 1 })).toEqual({ records: [] });
  });

  test("server errors are retryable", async () => {
    const err = await fetchError(
      httpSource(() => new Response(null, { status: 503, statusText: "Service Unavailable" }))
        .source,
    );
    expect(err.message).toBe("HTTP 503: Service Unavailable");
    expect(err.status).toBe(503);
    expect(err.retryable).toBe(true);
    expect(err.page).toBe(1);
  });

  test("client errors are not retryable", async () => {
    const err = await fetchError(httpSource(() => new Response(null, { status: 404 })).source);
    expect(err.message).toBe("HTTP 404: request failed");
    expect(err.retryable).toBe(false);
  });

  test("network failures are retryable", async () => {
    const err = await fetchError(
      httpSource(() => {
        throw new TypeError("fetch failed");
      }).source,
    );
    expect(err.message).toBe("fetch failed");
    expect(err.status).toBeNull();
    expect(err.retryable).toBe(true);
  });

  test("a body that is not JSON", async () => {
    const err = await fetchError(
      httpSource(() => new Response("<html>oops</html>", { status: 200 })).source,
    );
    expect(err.message.startsWith("invalid JSON body: ")).toBe(true);
    expect(err.retryable).toBe(true);
  });

  test("a payload of the wrong shape is not retried", async () => {
    const err = await fetchError(httpSource(() => json({ data: "nope" })).source);
    expect(err.message.startsWith("unexpected payload: ")).toBe(true);
    expect(err.retryable).toBe(false);

    const scalars = await fetchError(httpSource(() => json([1, 2])).source);
    expect(scalars.retryable).toBe(false);
  });
});

describe("FileRecordSource", () => {
  function writeJson(content: string): string {
    const path = join(makeTmpDir(), "export.json");
    writeFileSync(path, content);
    return path;
  }

  test("serves the array in pages", async () => {
    const all = [1, 2, 3, 4, 5].map((n) => rawRecord({ customer_id: `C${n}` }));
    const source = new FileRecordSource(writeJson(JSON.stringify(all)));

    expect(await source.fetchPage({ page: 1, pageSize: 2 })).toEqual({
      records: all.slice(0, 2),
      hasMore: true,
    });
    expect(await source.fetchPage({ page: 3, pageSize: 2 })).toEqual({
      records: all.slice(4),
      hasMore: false,
    });
    expect(await source.fetchPage({ page: 4, pageSize: 2 })).toEqual({
      records: [],
      hasMore: false,
    });
  });

  test("a missing file is not retried", async () => {
    const source = new FileRecordSource(join(makeTmpDir(), "missing.json"));
    await expect(source.fetchPage({ page: 1, pageSize: 10 })).rejects.toMatchObject({
      name: "PageFetchError",
      retryable: false,
    });
  });

  test("elements must be objects", async () => {
    const path = writeJson('[{"customer_id": "C1"}, 5]');
    const source = new FileRecordSource(path);
    await expect(source.fetchPage({ page: 1, pageSize: 10 })).rejects.toThrow(
      `${path}: element 1 is not an object`,
    );
  });

  test("malformed JSON", async () => {
    const source = new FileRecordSource(writeJson('[{"customer_id": '));
    await expect(source.fetchPage({ page: 1, pageSize: 10 })).rejects.toBeInstanceOf(
      PageFetchError,
    );
  });
});
