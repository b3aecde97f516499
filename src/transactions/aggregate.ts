/**
 * Per-customer rollups for the run summary. Reporting only; never persisted.
 */
import type { CleanRecord, CustomerTotal } from "../core/types.js";

export interface CustomerRollup {
  transactionCount: number;
  totalCents: number;
}

export function aggregateByCustomer(records: CleanRecord[]): Map<string, CustomerRollup> {
  const totals = new Map<string, CustomerRollup>();
  for (const r of records) {
    const entry = totals.get(r.customerId) ?? { transactionCount: 0, totalCents: 0 };
    entry.transactionCount++;
    entry.totalCents += r.amountCents;
    totals.set(r.customerId, entry);
  }
  return totals;
}

/** Flatten a rollup map, ordered by customer id. */
export function toCustomerTotals(totals: Map<string, CustomerRollup>): CustomerTotal[] {
  return [...totals.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([customerId, t]) => ({
      customerId,
      transactionCount: t.transactionCount,
      totalAmount: t.totalCents / 100,
    }));
}
