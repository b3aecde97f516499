/**
 * DDL for the transaction store, one script per dialect.
 *
 * Every statement is idempotent so `initialize()` can run on each start.
 */
import type { Dialect } from "./backend.js";

const AMOUNT_BAND_SEED = `
INSERT INTO amount_categories (name, min_amount, max_amount)
SELECT 'low', 0, 49.99
WHERE NOT EXISTS (SELECT 1 FROM amount_categories WHERE name = 'low');

INSERT INTO amount_categories (name, min_amount, max_amount)
SELECT 'medium', 50, 200
WHERE NOT EXISTS (SELECT 1 FROM amount_categories WHERE name = 'medium');

INSERT INTO amount_categories (name, min_amount, max_amount)
SELECT 'high', 200.01, NULL
WHERE NOT EXISTS (SELECT 1 FROM amount_categories WHERE name = 'high');
`;

const INDEXES = `
CREATE INDEX IF NOT EXISTS idx_transaction_date ON transactions(transaction_date);
CREATE INDEX IF NOT EXISTS idx_customer_transactions ON transactions(customer_id, transaction_date);
`;

const TOTALS_VIEW_BODY = `
SELECT
    customer_id,
    COUNT(*) AS total_transactions,
    SUM(transaction_amount) AS total_amount
FROM transactions
GROUP BY customer_id`;

export const SQLITE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS customers (
    customer_id VARCHAR(50) PRIMARY KEY,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS products (
    product_id VARCHAR(50) PRIMARY KEY,
    product_category VARCHAR(100) NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS spend_categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name VARCHAR(100) UNIQUE NOT NULL
);

CREATE TABLE IF NOT EXISTS transaction_types (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name VARCHAR(50) UNIQUE NOT NULL
);

CREATE TABLE IF NOT EXISTS amount_categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name VARCHAR(20) NOT NULL,
    min_amount DECIMAL(10,2),
    max_amount DECIMAL(10,2)
);

CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    customer_id VARCHAR(50) NOT NULL REFERENCES customers(customer_id),
    product_id VARCHAR(50) NOT NULL REFERENCES products(product_id),
    transaction_date DATE NOT NULL,
    transaction_amount DECIMAL(10,2) NOT NULL CHECK (transaction_amount >= 0),
    transaction_type_id INTEGER NOT NULL REFERENCES transaction_types(id),
    spend_category_id INTEGER NOT NULL REFERENCES spend_categories(id),
    amount_category_id INTEGER NOT NULL REFERENCES amount_categories(id),
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
${INDEXES}
CREATE VIEW IF NOT EXISTS customer_transaction_totals AS${TOTALS_VIEW_BODY};
${AMOUNT_BAND_SEED}`;

export const POSTGRES_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS customers (
    customer_id VARCHAR(50) PRIMARY KEY,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS products (
    product_id VARCHAR(50) PRIMARY KEY,
    product_category VARCHAR(100) NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);

CREATE TABLE IF NOT EXISTS spend_categories (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) UNIQUE NOT NULL
);

CREATE TABLE IF NOT EXISTS transaction_types (
    id SERIAL PRIMARY KEY,
    name VARCHAR(50) UNIQUE NOT NULL
);

CREATE TABLE IF NOT EXISTS amount_categories (
    id SERIAL PRIMARY KEY,
    name VARCHAR(20) NOT NULL,
    min_amount DECIMAL(10,2),
    max_amount DECIMAL(10,2)
);

CREATE TABLE IF NOT EXISTS transactions (
    id SERIAL PRIMARY KEY,
    customer_id VARCHAR(50) NOT NULL REFERENCES customers(customer_id),
    product_id VARCHAR(50) NOT NULL REFERENCES products(product_id),
    transaction_date DATE NOT NULL,
    transaction_amount DECIMAL(10,2) NOT NULL CHECK (transaction_amount >= 0),
    transaction_type_id INTEGER NOT NULL REFERENCES transaction_types(id),
    spend_category_id INTEGER NOT NULL REFERENCES spend_categories(id),
    amount_category_id INTEGER NOT NULL REFERENCES amount_categories(id),
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
${INDEXES}
CREATE OR REPLACE VIEW customer_transaction_totals AS${TOTALS_VIEW_BODY};
${AMOUNT_BAND_SEED}`;

export function schemaFor(dialect: Dialect): string {
  return dialect === "postgres" ? POSTGRES_SCHEMA_SQL : SQLITE_SCHEMA_SQL;
}
