import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type * as schema from "./schema/index.js";

export type Sqlite = BetterSQLite3Database<typeof schema>;

/**
 * Runtime configuration for the API server
 *
 * Values are read once at process start by `loadConfig()`.
 */
export interface KasirConfig {
  /** SQLite database file path, or `:memory:` */
  databaseUrl: string;
  /** Port the HTTP server listens on (default: 8080) */
  port: number;
  /** Minimum level written by the logger (default: 'info') */
  logLevel: LogLevel;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Soft-delete state of a stored row
 *
 * A row starts `active` and moves to `deleted` exactly once; it never goes back.
 */
export type Lifecycle = { state: "active" } | { state: "deleted"; at: Date };

export interface Category {
  id: number;
  name: string;
  description: string;
  lifecycle: Lifecycle;
}

export interface Product {
  id: number;
  name: string;
  price: number;
  stock: number;
  categoryId: number;
  /** Present only on single-product reads, when the referenced category row exists */
  category?: Category;
  lifecycle: Lifecycle;
}

export interface NewCategory {
  name: string;
  description: string;
}

export interface NewProduct {
  name: string;
  price: number;
  stock: number;
  categoryId: number;
}

/**
 * Partial update payloads
 *
 * An omitted or empty string keeps the stored value, so a field cannot be
 * cleared through an update.
 */
export type CategoryPatch = Partial<NewCategory>;
export type ProductPatch = Partial<NewProduct>;

export interface TopProduct {
  name: string;
  quantitySold: number;
}

/**
 * Sales aggregate over a date range
 */
export interface SalesReport {
  totalRevenue: number;
  totalTransactionCount: number;
  /** Product with the highest summed quantity, or null when nothing was sold */
  topProduct: TopProduct | null;
}

/**
 * Inclusive timestamp bounds, formatted as `YYYY-MM-DD HH:MM:SS`
 */
export interface DateRange {
  start: string;
  end: string;
}
