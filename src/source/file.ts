/**
 * Local JSON export as a record source. The file holds one top-level array;
 * it is streamed once and then served in `pageSize` slices.
 */
import { createReadStream } from "node:fs";
import StreamArray from "stream-json/streamers/StreamArray.js";

import { PageFetchError, errorMessage } from "../core/exceptions.js";
import type { RawRecord } from "../core/types.js";
import { RawRecordSchema } from "../transactions/schemas.js";
import type { Page, PageRequest, RecordSource } from "./backend.js";

export class FileRecordSource implements RecordSource {
  private path: string;
  private records: RawRecord[] | null = null;

  constructor(path: string) {
    this.path = path;
  }

  async fetchPage(request: PageRequest): Promise<Page> {
    let all: RawRecord[];
    try {
      all = await this.load();
    } catch (err) {
      throw new PageFetchError(request.page, errorMessage(err), {
        retryable: false,
        cause: err,
      });
    }
    const start = (request.page - 1) * request.pageSize;
    const records = all.slice(start, start + request.pageSize);
    return { records, hasMore: start + request.pageSize < all.length };
  }

  private async load(): Promise<RawRecord[]> {
    if (this.records) return this.records;

    const records = await new Promise<RawRecord[]>((resolve, reject) => {
      const out: RawRecord[] = [];
      let rejected = false;
      const onError = (err: Error) => {
        if (!rejected) {
          rejected = true;
          reject(err);
        }
      };

      const fileStream = createReadStream(this.path);
      const arrayStream = StreamArray.withParser();

      fileStream.on("error", onError);
      arrayStream.on("error", onError);

      fileStream.pipe(arrayStream);

      arrayStream.on("data", ({ key, value }: { key: number; value: unknown }) => {
        const parsed = RawRecordSchema.safeParse(value);
        if (!parsed.success) {
          onError(new Error(`${this.path}: element ${key} is not an object`));
          return;
        }
        out.push(parsed.data);
      });

      arrayStream.on("end", () => {
        if (!rejected) resolve(out);
      });
    });

    this.records = records;
    return records;
  }
}
