import { and, asc, eq, isNull } from "drizzle-orm";
import { NotFoundError } from "../errors.js";
import { category, product, type ProductRow } from "../schema/index.js";
import type { NewProduct, Product, Sqlite } from "../types.js";
import { lifecycleFromColumn } from "../utils/lifecycle.js";
import { formatTimestamp } from "../utils/time.js";
import { toCategory } from "./category-repository.js";

function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    price: row.price,
    stock: row.stock,
    categoryId: row.categoryId,
    lifecycle: lifecycleFromColumn(row.deletedAt),
  };
}

const isActiveProduct = (id: number) => and(eq(product.id, id), isNull(product.deletedAt));

export class ProductRepository {
  constructor(private readonly db: Sqlite) {}

  async getAll(): Promise<Product[]> {
    const rows = await this.db
      .select()
      .from(product)
      .where(isNull(product.deletedAt))
      .orderBy(asc(product.id));

    return rows.map(toProduct);
  }

  /**
   * Fetch an active product with its category embedded
   *
   * The category is joined regardless of its own soft-delete state; it is
   * left out only when the referenced row does not exist.
   *
   * @throws {NotFoundError} When no active product has this id
   */
  async getById(id: number): Promise<Product> {
    const [row] = await this.db
      .select({ product, category })
      .from(product)
      .leftJoin(category, eq(product.categoryId, category.id))
      .where(isActiveProduct(id))
      .limit(1);

    if (!row) {
      throw new NotFoundError("Product", id);
    }

    const result = toProduct(row.product);
    if (row.category) {
      result.category = toCategory(row.category);
    }
    return result;
  }

  async create(input: NewProduct): Promise<Product> {
    const [row] = await this.db
      .insert(product)
      .values({
        name: input.name,
        price: input.price,
        stock: input.stock,
        categoryId: input.categoryId,
      })
      .returning();

    return toProduct(row);
  }

  /**
   * @throws {NotFoundError} When the product is missing or soft-deleted
   */
  async update(entity: Product): Promise<Product> {
    const [row] = await this.db
      .update(product)
      .set({
        name: entity.name,
        price: entity.price,
        stock: entity.stock,
        categoryId: entity.categoryId,
      })
      .where(isActiveProduct(entity.id))
      .returning();

    if (!row) {
      throw new NotFoundError("Product", entity.id);
    }

    return toProduct(row);
  }

  /**
   * @throws {NotFoundError} When no active product was affected
   */
  async delete(id: number, now: Date = new Date()): Promise<void> {
    const affected = await this.db
      .update(product)
      .set({ deletedAt: formatTimestamp(now) })
      .where(isActiveProduct(id))
      .returning({ id: product.id });

    if (affected.length === 0) {
      throw new NotFoundError("Product", id);
    }
  }
}
