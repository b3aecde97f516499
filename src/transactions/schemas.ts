/**
 * Zod schemas for raw transaction pages.
 */
import { z } from "zod";

export const RawRecordSchema = z.record(z.unknown());

const RecordListSchema = z.array(RawRecordSchema);

export const PageEnvelopeSchema = z.object({
  data: RecordListSchema.optional(),
  transactions: RecordListSchema.optional(),
  records: RecordListSchema.optional(),
  has_more: z.boolean().optional(),
  next_page: z.number().int().nullable().optional(),
});

/** A page is either a bare array of records or an envelope around one. */
export const PageResponseSchema = z.union([RecordListSchema, PageEnvelopeSchema]);

export type PageEnvelope = z.infer<typeof PageEnvelopeSchema>;
export type PageResponse = z.infer<typeof PageResponseSchema>;
