import { describe, expect, it } from "vitest";
import { NotFoundError } from "../src/errors.js";
import { CategoryRepository } from "../src/repositories/category-repository.js";
import { TestDb } from "./helpers/test-db.js";

describe("CategoryRepository", () => {
  describe("create / getById", () => {
    it("should return the stored category with a server-assigned id", async () => {
      await TestDb.using(async (db) => {
        const repo = new CategoryRepository(db);

        const created = await repo.create({ name: "Drinks", description: "Beverages" });
        const fetched = await repo.getById(created.id);

        expect(created).toEqual({ id: 1, name: "Drinks", description: "Beverages", lifecycle: { state: "active" } });
        expect(fetched).toEqual(created);
      });
    });

    it("should reject an id that was never created", async () => {
      await TestDb.using(async (db) => {
        const repo = new CategoryRepository(db);

        await expect(repo.getById(42)).rejects.toBeInstanceOf(NotFoundError);
      });
    });
  });

  describe("getAll", () => {
    it("should list active categories in id order", async () => {
      await TestDb.using(async (db) => {
        const repo = new CategoryRepository(db);
        await repo.create({ name: "Drinks", description: "Beverages" });
        await repo.create({ name: "Food", description: "" });

        const result = await repo.getAll();

        expect(result.map((c) => c.name)).toEqual(["Drinks", "Food"]);
      });
    });

    it("should return an empty list when there are no categories", async () => {
      await TestDb.using(async (db) => {
        expect(await new CategoryRepository(db).getAll()).toEqual([]);
      });
    });
  });

  describe("delete", () => {
    it("should hide the category from reads but keep the row", async () => {
      await TestDb.using(async (db, sqlite) => {
        const repo = new CategoryRepository(db);
        const drinks = await repo.create({ name: "Drinks", description: "Beverages" });
        const food = await repo.create({ name: "Food", description: "" });

        await repo.delete(drinks.id, new Date(2024, 0, 15, 10, 30, 0));

        await expect(repo.getById(drinks.id)).rejects.toBeInstanceOf(NotFoundError);
        expect((await repo.getAll()).map((c) => c.id)).toEqual([food.id]);
        expect(sqlite.prepare("SELECT deleted_at FROM category WHERE id = ?").get(drinks.id)).toEqual({
          deleted_at: "2024-01-15 10:30:00",
        });
      });
    });

    it("should not delete the same category twice", async () => {
      await TestDb.using(async (db, sqlite) => {
        const repo = new CategoryRepository(db);
        const drinks = await repo.create({ name: "Drinks", description: "Beverages" });

        await repo.delete(drinks.id, new Date(2024, 0, 15, 10, 30, 0));
        await expect(repo.delete(drinks.id, new Date(2024, 0, 16, 8, 0, 0))).rejects.toBeInstanceOf(NotFoundError);

        expect(sqlite.prepare("SELECT deleted_at FROM category WHERE id = ?").get(drinks.id)).toEqual({
          deleted_at: "2024-01-15 10:30:00",
        });
      });
    });

    it("should reject an unknown id", async () => {
      await TestDb.using(async (db) => {
        await expect(new CategoryRepository(db).delete(7)).rejects.toThrow("Category 7 not found");
      });
    });
  });

  describe("update", () => {
    it("should replace name and description", async () => {
      await TestDb.using(async (db) => {
        const repo = new CategoryRepository(db);
        const drinks = await repo.create({ name: "Drinks", description: "Beverages" });

        const updated = await repo.update({ ...drinks, name: "Cold Drinks", description: "Iced" });

        expect(updated).toEqual({ id: drinks.id, name: "Cold Drinks", description: "Iced", lifecycle: { state: "active" } });
        expect(await repo.getById(drinks.id)).toEqual(updated);
      });
    });

    it("should reject a soft-deleted category", async () => {
      await TestDb.using(async (db) => {
        const repo = new CategoryRepository(db);
        const drinks = await repo.create({ name: "Drinks", description: "Beverages" });
        await repo.delete(drinks.id);

        await expect(repo.update({ ...drinks, name: "Back" })).rejects.toBeInstanceOf(NotFoundError);
      });
    });
  });
});
