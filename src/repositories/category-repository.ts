import { and, asc, eq, isNull } from "drizzle-orm";
import { NotFoundError } from "../errors.js";
import { category, type CategoryRow } from "../schema/index.js";
import type { Category, NewCategory, Sqlite } from "../types.js";
import { lifecycleFromColumn } from "../utils/lifecycle.js";
import { formatTimestamp } from "../utils/time.js";

export function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    lifecycle: lifecycleFromColumn(row.deletedAt),
  };
}

const isActiveCategory = (id: number) => and(eq(category.id, id), isNull(category.deletedAt));

/**
 * Category persistence. Every read and write is scoped to rows that have not
 * been soft-deleted.
 */
export class CategoryRepository {
  constructor(private readonly db: Sqlite) {}

  async getAll(): Promise<Category[]> {
    const rows = await this.db
      .select()
      .from(category)
      .where(isNull(category.deletedAt))
      .orderBy(asc(category.id));

    return rows.map(toCategory);
  }

  /**
   * @throws {NotFoundError} When no active category has this id
   */
  async getById(id: number): Promise<Category> {
    const [row] = await this.db.select().from(category).where(isActiveCategory(id)).limit(1);
    if (!row) {
      throw new NotFoundError("Category", id);
    }

    return toCategory(row);
  }

  async create(input: NewCategory): Promise<Category> {
    const [row] = await this.db
      .insert(category)
      .values({ name: input.name, description: input.description })
      .returning();

    return toCategory(row);
  }

  /**
   * Replace the editable fields of an active category
   *
   * @throws {NotFoundError} When the category is missing or soft-deleted
   */
  async update(entity: Category): Promise<Category> {
    const [row] = await this.db
      .update(category)
      .set({ name: entity.name, description: entity.description })
      .where(isActiveCategory(entity.id))
      .returning();

    if (!row) {
      throw new NotFoundError("Category", entity.id);
    }

    return toCategory(row);
  }

  /**
   * Soft delete: stamp `deleted_at`, keep the row
   *
   * @throws {NotFoundError} When no active category was affected
   */
  async delete(id: number, now: Date = new Date()): Promise<void> {
    const affected = await this.db
      .update(category)
      .set({ deletedAt: formatTimestamp(now) })
      .where(isActiveCategory(id))
      .returning({ id: category.id });

    if (affected.length === 0) {
      throw new NotFoundError("Category", id);
    }
  }
}
