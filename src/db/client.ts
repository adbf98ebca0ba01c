import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import { StoreError, errorMessage } from "../errors.js";
import * as schema from "../schema/index.js";
import type { Sqlite } from "../types.js";
import { migrate } from "./migrate.js";

export interface DatabaseHandle {
  db: Sqlite;
  close(): void;
}

/**
 * Open the SQLite store, enforce foreign keys, check it answers and create
 * the schema
 *
 * @param url - Database file path, or `:memory:`
 * @throws {StoreError} When the file cannot be opened or queried
 */
export function openDatabase(url: string): DatabaseHandle {
  let sqlite: Database.Database;
  try {
    sqlite = new Database(url);
  } catch (error) {
    throw new StoreError(`Error opening database connection: ${errorMessage(error)}`, { cause: error });
  }

  try {
    sqlite.pragma("foreign_keys = ON");
    sqlite.prepare("SELECT 1").get();
    migrate(sqlite);
  } catch (error) {
    sqlite.close();
    throw new StoreError(`Error connecting to database: ${errorMessage(error)}`, { cause: error });
  }

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
