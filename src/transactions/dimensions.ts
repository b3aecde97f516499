/**
 * Dimension resolution: natural key → key of the lookup row, creating the row
 * when it is missing.
 *
 * Meant to live for one transaction. Inserts run in a savepoint so a
 * uniqueness violation leaves the surrounding transaction usable; the key is
 * then re-read instead of failing the batch.
 */
import { StoreConstraintError } from "../core/exceptions.js";
import type { DatabaseBackend, SqlParam } from "../db/backend.js";
import type { AmountBand } from "./categorize.js";
import { centsToDecimal } from "./money.js";

interface DimensionTable {
  table: string;
  keyColumn: string;
  idColumn: string;
}

const CUSTOMERS: DimensionTable = {
  table: "customers",
  keyColumn: "customer_id",
  idColumn: "customer_id",
};
const PRODUCTS: DimensionTable = {
  table: "products",
  keyColumn: "product_id",
  idColumn: "product_id",
};
const SPEND_CATEGORIES: DimensionTable = {
  table: "spend_categories",
  keyColumn: "name",
  idColumn: "id",
};
const TRANSACTION_TYPES: DimensionTable = {
  table: "transaction_types",
  keyColumn: "name",
  idColumn: "id",
};
const AMOUNT_CATEGORIES: DimensionTable = {
  table: "amount_categories",
  keyColumn: "name",
  idColumn: "id",
};

function surrogate(table: string, value: unknown): number {
  const id = typeof value === "string" ? Number(value) : value;
  if (typeof id !== "number" || !Number.isInteger(id)) {
    throw new Error(`${table}: store returned a non-integer key ${String(value)}`);
  }
  return id;
}

export class DimensionResolver {
  private db: DatabaseBackend;
  private cache = new Map<string, unknown>();

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async customer(customerId: string): Promise<string> {
    return String(await this.resolve(CUSTOMERS, customerId));
  }

  /** A product keeps the category it was first seen with. */
  async product(productId: string, productCategory: string): Promise<string> {
    return String(
      await this.resolve(PRODUCTS, productId, { product_category: productCategory }),
    );
  }

  async spendCategory(name: string): Promise<number> {
    return surrogate(SPEND_CATEGORIES.table, await this.resolve(SPEND_CATEGORIES, name));
  }

  async transactionType(name: string): Promise<number> {
    return surrogate(TRANSACTION_TYPES.table, await this.resolve(TRANSACTION_TYPES, name));
  }

  /** Bands are seeded by `initialize()`; a missing one is created from its bounds. */
  async amountCategory(band: AmountBand): Promise<number> {
    const id = await this.resolve(AMOUNT_CATEGORIES, band.name, {
      min_amount: centsToDecimal(band.minCents),
      max_amount: band.maxCents === null ? null : centsToDecimal(band.maxCents),
    });
    return surrogate(AMOUNT_CATEGORIES.table, id);
  }

  private async resolve(
    dim: DimensionTable,
    key: string,
    extra: Record<string, SqlParam> = {},
  ): Promise<unknown> {
    const cacheKey = `${dim.table}\u0000${key}`;
    if (this.cache.has(cacheKey)) return this.cache.get(cacheKey);

    const id = (await this.lookup(dim, key)) ?? (await this.insert(dim, key, extra));
    this.cache.set(cacheKey, id);
    return id;
  }

  private async lookup(dim: DimensionTable, key: string): Promise<unknown> {
    const row = await this.db.queryOne<{ id: unknown }>(
      `SELECT ${dim.idColumn} AS id FROM ${dim.table} WHERE ${dim.keyColumn} = ? ORDER BY ${dim.idColumn} LIMIT 1`,
      [key],
    );
    return row?.id ?? null;
  }

  private async insert(
    dim: DimensionTable,
    key: string,
    extra: Record<string, SqlParam>,
  ): Promise<unknown> {
    const columns = [dim.keyColumn, ...Object.keys(extra)];
    const values: SqlParam[] = [key, ...Object.values(extra)];
    const placeholders = columns.map(() => "?").join(", ");

    try {
      const row = await this.db.transaction(() =>
        this.db.queryOne<{ id: unknown }>(
          `INSERT INTO ${dim.table} (${columns.join(", ")}) VALUES (${placeholders}) RETURNING ${dim.idColumn} AS id`,
          values,
        ),
      );
      if (row?.id == null) throw new Error(`${dim.table}: insert returned no key`);
      return row.id;
    } catch (err) {
      if (!(err instanceof StoreConstraintError && err.kind === "unique")) throw err;
      const existing = await this.lookup(dim, key);
      if (existing === null) throw err;
      return existing;
    }
  }
}
