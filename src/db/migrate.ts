import type Database from "better-sqlite3";

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS "category" (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    deleted_at TEXT
  );

  CREATE TABLE IF NOT EXISTS "product" (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    price INTEGER NOT NULL,
    stock INTEGER NOT NULL DEFAULT 0,
    category_id INTEGER NOT NULL REFERENCES "category"(id),
    deleted_at TEXT
  );

  CREATE TABLE IF NOT EXISTS "transactions" (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    total_amount INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    deleted_at TEXT
  );

  CREATE TABLE IF NOT EXISTS "transaction_details" (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    transaction_id INTEGER NOT NULL REFERENCES "transactions"(id),
    product_id INTEGER NOT NULL REFERENCES "product"(id),
    quantity INTEGER NOT NULL,
    price INTEGER NOT NULL,
    subtotal INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS "transactions_created_at_idx" ON "transactions"(created_at);
  CREATE INDEX IF NOT EXISTS "transaction_details_transaction_idx" ON "transaction_details"(transaction_id);
`;

/**
 * Create every table the API reads or writes. Safe to run repeatedly.
 */
export function migrate(sqlite: Database.Database): void {
  sqlite.exec(SCHEMA_SQL);
}
