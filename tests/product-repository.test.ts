import { describe, expect, it } from "vitest";
import { NotFoundError } from "../src/errors.js";
import { CategoryRepository } from "../src/repositories/category-repository.js";
import { ProductRepository } from "../src/repositories/product-repository.js";
import { TestDb } from "./helpers/test-db.js";

describe("ProductRepository", () => {
  describe("getById", () => {
    it("should embed the referenced category", async () => {
      await TestDb.using(async (db) => {
        const drinks = await new CategoryRepository(db).create({ name: "Drinks", description: "Beverages" });
        const repo = new ProductRepository(db);
        const coffee = await repo.create({ name: "Coffee", price: 10000, stock: 50, categoryId: drinks.id });

        const result = await repo.getById(coffee.id);

        expect(result).toEqual({
          id: 1,
          name: "Coffee",
          price: 10000,
          stock: 50,
          categoryId: 1,
          category: { id: 1, name: "Drinks", description: "Beverages", lifecycle: { state: "active" } },
          lifecycle: { state: "active" },
        });
      });
    });

    it("should still embed a soft-deleted category", async () => {
      await TestDb.using(async (db) => {
        const categories = new CategoryRepository(db);
        const drinks = await categories.create({ name: "Drinks", description: "Beverages" });
        const repo = new ProductRepository(db);
        const coffee = await repo.create({ name: "Coffee", price: 10000, stock: 50, categoryId: drinks.id });

        await categories.delete(drinks.id, new Date(2024, 0, 15, 10, 30, 0));
        const result = await repo.getById(coffee.id);

        expect(result.category?.name).toBe("Drinks");
        expect(result.category?.lifecycle).toEqual({ state: "deleted", at: new Date(2024, 0, 15, 10, 30, 0) });
      });
    });

    it("should leave the category out when the referenced row is missing", async () => {
      await TestDb.using(async (db, sqlite) => {
        sqlite.pragma("foreign_keys = OFF");
        sqlite.exec(`INSERT INTO "product" (id, name, price, stock, category_id) VALUES (1, 'Orphan', 100, 1, 99)`);

        const result = await new ProductRepository(db).getById(1);

        expect(result.categoryId).toBe(99);
        expect(result.category).toBeUndefined();
      });
    });

    it("should reject a soft-deleted product", async () => {
      await TestDb.using(async (db) => {
        const drinks = await new CategoryRepository(db).create({ name: "Drinks", description: "" });
        const repo = new ProductRepository(db);
        const coffee = await repo.create({ name: "Coffee", price: 10000, stock: 50, categoryId: drinks.id });

        await repo.delete(coffee.id);

        await expect(repo.getById(coffee.id)).rejects.toBeInstanceOf(NotFoundError);
        expect(await repo.getAll()).toEqual([]);
      });
    });
  });

  describe("create", () => {
    it("should fail when the category does not exist", async () => {
      await TestDb.using(async (db) => {
        const repo = new ProductRepository(db);

        await expect(repo.create({ name: "Coffee", price: 10000, stock: 5, categoryId: 42 })).rejects.toThrow(
          "FOREIGN KEY constraint failed"
        );
      });
    });
  });

  describe("update", () => {
    it("should replace every editable field", async () => {
      await TestDb.using(async (db) => {
        const categories = new CategoryRepository(db);
        const drinks = await categories.create({ name: "Drinks", description: "" });
        const food = await categories.create({ name: "Food", description: "" });
        const repo = new ProductRepository(db);
        const coffee = await repo.create({ name: "Coffee", price: 10000, stock: 50, categoryId: drinks.id });

        const updated = await repo.update({ ...coffee, name: "Mocha", price: 12000, stock: 10, categoryId: food.id });

        expect(updated).toEqual({
          id: coffee.id,
          name: "Mocha",
          price: 12000,
          stock: 10,
          categoryId: food.id,
          lifecycle: { state: "active" },
        });
      });
    });

    it("should reject an unknown product", async () => {
      await TestDb.using(async (db) => {
        const repo = new ProductRepository(db);

        await expect(
          repo.update({ id: 5, name: "Ghost", price: 1, stock: 1, categoryId: 1, lifecycle: { state: "active" } })
        ).rejects.toThrow("Product 5 not found");
      });
    });
  });

  describe("delete", () => {
    it("should reject an id with no active product", async () => {
      await TestDb.using(async (db) => {
        await expect(new ProductRepository(db).delete(3)).rejects.toBeInstanceOf(NotFoundError);
      });
    });
  });
});
