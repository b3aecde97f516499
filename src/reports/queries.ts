/**
 * Read-only insight queries over the loaded transactions.
 */
import { format, subYears } from "date-fns";

import type { CustomerTotal } from "../core/types.js";
import type { DatabaseBackend } from "../db/backend.js";
import { decimalToNumber } from "../transactions/money.js";

export interface ProductCategoryTotal {
  productCategory: string;
  transactionCount: number;
  totalAmount: number;
}

export interface TopCustomer {
  customerId: string;
  transactionCount: number;
  totalSpend: number;
  avgTransactionAmount: number;
}

export interface MonthlyTrend {
  /** `YYYY-MM` */
  month: string;
  transactionCount: number;
  totalSpend: number;
  uniqueCustomers: number;
  avgTransactionAmount: number;
  /** Percent change against the previous month, null for the first month. */
  monthOverMonthGrowth: number | null;
}

const round2 = (n: number): number => Math.round(n * 100) / 100;

/** Rows of the `customer_transaction_totals` view. */
export async function customerTotals(db: DatabaseBackend): Promise<CustomerTotal[]> {
  const rows = await db.query<{
    customer_id: string;
    total_transactions: unknown;
    total_amount: unknown;
  }>(
    `SELECT customer_id, total_transactions, total_amount
     FROM customer_transaction_totals
     ORDER BY customer_id`,
  );
  return rows.map((r) => ({
    customerId: r.customer_id,
    transactionCount: decimalToNumber(r.total_transactions),
    totalAmount: round2(decimalToNumber(r.total_amount)),
  }));
}

export async function productCategoryTotals(
  db: DatabaseBackend,
): Promise<ProductCategoryTotal[]> {
  const rows = await db.query<{
    product_category: string;
    transaction_count: unknown;
    total_amount: unknown;
  }>(
    `SELECT p.product_category,
            COUNT(*) AS transaction_count,
            SUM(t.transaction_amount) AS total_amount
     FROM transactions t
     JOIN products p ON t.product_id = p.product_id
     GROUP BY p.product_category
     ORDER BY total_amount DESC, p.product_category`,
  );
  return rows.map((r) => ({
    productCategory: r.product_category,
    transactionCount: decimalToNumber(r.transaction_count),
    totalAmount: round2(decimalToNumber(r.total_amount)),
  }));
}

export async function topCustomers(db: DatabaseBackend, limit = 5): Promise<TopCustomer[]> {
  const rows = await db.query<{
    customer_id: string;
    transaction_count: unknown;
    total_spend: unknown;
  }>(
    `SELECT c.customer_id,
            COUNT(*) AS transaction_count,
            SUM(t.transaction_amount) AS total_spend
     FROM transactions t
     JOIN customers c ON t.customer_id = c.customer_id
     GROUP BY c.customer_id
     ORDER BY total_spend DESC, c.customer_id
     LIMIT ?`,
    [limit],
  );
  return rows.map((r) => {
    const count = decimalToNumber(r.transaction_count);
    const total = decimalToNumber(r.total_spend);
    return {
      customerId: r.customer_id,
      transactionCount: count,
      totalSpend: round2(total),
      avgTransactionAmount: count === 0 ? 0 : round2(total / count),
    };
  });
}

/**
 * Monthly spend since `since` (default: one year ago), newest month first,
 * with month-over-month growth.
 */
export async function monthlyTrends(
  db: DatabaseBackend,
  opts: { since?: string } = {},
): Promise<MonthlyTrend[]> {
  const since = opts.since ?? format(subYears(new Date(), 1), "yyyy-MM-dd");
  const month =
    db.dialect === "postgres"
      ? "to_char(transaction_date, 'YYYY-MM')"
      : "substr(transaction_date, 1, 7)";

  const rows = await db.query<{
    month: string;
    transaction_count: unknown;
    total_spend: unknown;
    unique_customers: unknown;
  }>(
    `SELECT ${month} AS month,
            COUNT(*) AS transaction_count,
            SUM(transaction_amount) AS total_spend,
            COUNT(DISTINCT customer_id) AS unique_customers
     FROM transactions
     WHERE transaction_date >= ?
     GROUP BY ${month}
     ORDER BY month`,
    [since],
  );

  let previous: number | null = null;
  const trends = rows.map((r) => {
    const count = decimalToNumber(r.transaction_count);
    const total = round2(decimalToNumber(r.total_spend));
    const growth: number | null =
      previous === null || previous === 0 ? null : round2(((total - previous) / previous) * 100);
    previous = total;
    return {
      month: r.month,
      transactionCount: count,
      totalSpend: total,
      uniqueCustomers: decimalToNumber(r.unique_customers),
      avgTransactionAmount: count === 0 ? 0 : round2(total / count),
      monthOverMonthGrowth: growth,
    };
  });
  return trends.reverse();
}
