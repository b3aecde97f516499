/**
 * Record validation and cleaning: repairs or rejects raw records and drops
 * in-batch duplicates.
 */
import { format, isValid, parse } from "date-fns";

import type {
  CleanRecord,
  RawRecord,
  Rejection,
  RejectionReason,
} from "../core/types.js";
import { MAX_CENTS, decimalTextToCents, toCents } from "./money.js";

export const UNKNOWN_TYPE = "unknown";
export const UNCATEGORIZED = "uncategorized";

type Field =
  | "customer_id"
  | "product_id"
  | "product_category"
  | "transaction_date"
  | "transaction_amount"
  | "transaction_type"
  | "spend_category";

/** Accepted spellings per field, canonical name first. */
export const FIELD_ALIASES: Record<Field, string[]> = {
  customer_id: ["customer_id", "customerId", "customer"],
  product_id: ["product_id", "productId", "product"],
  product_category: ["product_category", "productCategory"],
  transaction_date: ["transaction_date", "transactionDate", "date"],
  transaction_amount: ["transaction_amount", "transactionAmount", "amount"],
  transaction_type: ["transaction_type", "transactionType", "type"],
  spend_category: ["spend_category", "spendCategory", "category"],
};

const REQUIRED_FIELDS: Field[] = [
  "customer_id",
  "product_id",
  "transaction_date",
  "transaction_amount",
];

const DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy/MM/dd",
  "MM/dd/yyyy",
  "yyyyMMdd",
  "dd MMM yyyy",
  "MMM d, yyyy",
];

/** ISO date-time: keep the calendar date as written, ignore time and zone. */
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;
const REFERENCE_DATE = new Date(2000, 0, 1);
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

/** Column widths of the store; longer values are rejected, never truncated. */
export const MAX_LENGTHS = {
  customer_id: 50,
  product_id: 50,
  product_category: 100,
  transaction_type: 50,
  spend_category: 100,
} satisfies Partial<Record<Field, number>>;

export interface CleanResult {
  /** Unique, valid records in first-seen order. */
  accepted: CleanRecord[];
  /** Valid records whose identity was already seen in this batch. */
  duplicates: CleanRecord[];
  rejected: Rejection[];
}

export type CleanOutcome =
  | { ok: true; record: CleanRecord }
  | { ok: false; reason: RejectionReason; detail: string };

function pick(raw: RawRecord, field: Field): unknown {
  for (const alias of FIELD_ALIASES[field]) {
    const value = raw[alias];
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

/** Trimmed text of a scalar, or null when blank or not a scalar. */
function text(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "bigint") return value.toString();
  return null;
}

/** Lookup-domain names are compared trimmed, single-spaced and lower-case. */
export function normalizeName(value: unknown, fallback: string): string {
  const raw = text(value);
  if (raw === null) return fallback;
  return raw.replace(/\s+/g, " ").toLowerCase();
}

/** Parse any accepted date representation to `YYYY-MM-DD`, or null. */
export function normalizeDate(value: unknown): string | null {
  const raw = text(value);
  if (raw === null) return null;

  const iso = ISO_DATE_TIME.exec(raw);
  const candidate = iso ? iso[1] : raw;

  for (const pattern of DATE_FORMATS) {
    const parsed = parse(candidate, pattern, REFERENCE_DATE);
    if (!isValid(parsed)) continue;
    const year = parsed.getFullYear();
    if (year < MIN_YEAR || year > MAX_YEAR) continue;
    return format(parsed, "yyyy-MM-dd");
  }
  return null;
}

/**
 * Numbers and numeric strings (currency symbol and thousands separators
 * allowed), in whole cents. Null when the value is not numeric.
 */
export function parseAmountCents(value: unknown): number | null {
  if (typeof value === "number") return Number.isNaN(value) ? null : toCents(value);
  if (typeof value !== "string") return null;

  const cleaned = value
    .trim()
    .replace(/^([-+]?)[$€£]/, "$1")
    .replace(/,/g, "");
  return decimalTextToCents(cleaned);
}

function isBlank(value: unknown): boolean {
  return value === undefined || (typeof value === "string" && value.trim() === "");
}

function tooLong(field: keyof typeof MAX_LENGTHS, value: string): CleanOutcome | null {
  const max = MAX_LENGTHS[field];
  if (value.length <= max) return null;
  return {
    ok: false,
    reason: "invalid_field",
    detail: `${field} longer than ${max} characters`,
  };
}

/** Validate and normalize a single raw record. */
export function cleanRecord(raw: RawRecord): CleanOutcome {
  for (const field of REQUIRED_FIELDS) {
    if (isBlank(pick(raw, field))) {
      return { ok: false, reason: "missing_field", detail: `missing ${field}` };
    }
  }

  const customerId = text(pick(raw, "customer_id"));
  const productId = text(pick(raw, "product_id"));
  if (customerId === null || productId === null) {
    const field = customerId === null ? "customer_id" : "product_id";
    return { ok: false, reason: "invalid_field", detail: `${field} is not a scalar` };
  }

  const rawDate = pick(raw, "transaction_date");
  const transactionDate = normalizeDate(rawDate);
  if (transactionDate === null) {
    return { ok: false, reason: "bad_date", detail: `unparseable date: ${String(rawDate)}` };
  }

  const rawAmount = pick(raw, "transaction_amount");
  const amountCents = parseAmountCents(rawAmount);
  if (amountCents === null) {
    return {
      ok: false,
      reason: "invalid_amount",
      detail: `non-numeric amount: ${String(rawAmount)}`,
    };
  }
  if (amountCents < 0) {
    return {
      ok: false,
      reason: "negative_amount",
      detail: `negative amount: ${String(rawAmount)}`,
    };
  }
  if (amountCents > MAX_CENTS) {
    return {
      ok: false,
      reason: "invalid_amount",
      detail: `amount out of range: ${String(rawAmount)}`,
    };
  }

  const record: CleanRecord = {
    customerId,
    productId,
    productCategory: normalizeName(pick(raw, "product_category"), UNCATEGORIZED),
    transactionDate,
    amountCents,
    transactionType: normalizeName(pick(raw, "transaction_type"), UNKNOWN_TYPE),
    spendCategory: normalizeName(pick(raw, "spend_category"), UNCATEGORIZED),
  };
  const overLong =
    tooLong("customer_id", record.customerId) ??
    tooLong("product_id", record.productId) ??
    tooLong("product_category", record.productCategory) ??
    tooLong("transaction_type", record.transactionType) ??
    tooLong("spend_category", record.spendCategory);
  return overLong ?? { ok: true, record };
}

/** Composite identity used for in-batch deduplication. */
export function identityOf(record: CleanRecord): string {
  return [
    record.customerId,
    record.productId,
    record.transactionDate,
    record.amountCents,
  ].join("\u0000");
}

/**
 * Clean a batch. Every input record ends up in exactly one of `accepted`,
 * `duplicates` or `rejected`.
 */
export function cleanRecords(raws: RawRecord[]): CleanResult {
  const result: CleanResult = { accepted: [], duplicates: [], rejected: [] };
  const seen = new Set<string>();

  raws.forEach((raw, index) => {
    const outcome = cleanRecord(raw);
    if (!outcome.ok) {
      result.rejected.push({
        index,
        reason: outcome.reason,
        detail: outcome.detail,
        record: raw,
      });
      return;
    }

    const identity = identityOf(outcome.record);
    if (seen.has(identity)) {
      result.duplicates.push(outcome.record);
      return;
    }
    seen.add(identity);
    result.accepted.push(outcome.record);
  });

  return result;
}

export function countByReason(
  rejected: Rejection[],
): Partial<Record<RejectionReason, number>> {
  const counts: Partial<Record<RejectionReason, number>> = {};
  for (const r of rejected) counts[r.reason] = (counts[r.reason] ?? 0) + 1;
  return counts;
}
