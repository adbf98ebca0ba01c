import { describe, expect, it } from "vitest";
import { openDatabase } from "../src/db/client.js";
import { StoreError } from "../src/errors.js";
import { CategoryRepository } from "../src/repositories/category-repository.js";

describe("openDatabase", () => {
  it("should open an in-memory store with the schema in place", async () => {
    const database = openDatabase(":memory:");
    try {
      const repo = new CategoryRepository(database.db);
      await repo.create({ name: "Drinks", description: "Beverages" });

      expect((await repo.getAll()).map((c) => c.name)).toEqual(["Drinks"]);
    } finally {
      database.close();
    }
  });

  it("should fail with a StoreError when the file cannot be opened", () => {
    expect(() => openDatabase("/no-such-directory/kasir.db")).toThrow(StoreError);
    expect(() => openDatabase("/no-such-directory/kasir.db")).toThrow(/^Error opening database connection: /);
  });
});
