import type { CategoryRepository } from "../repositories/category-repository.js";
import type { Category, CategoryPatch, NewCategory } from "../types.js";

/**
 * Apply a patch onto a stored category. A field replaces the stored value only
 * when it is a non-empty string.
 */
export function mergeCategory(existing: Category, patch: CategoryPatch): Category {
  return {
    ...existing,
    name: patch.name ? patch.name : existing.name,
    description: patch.description ? patch.description : existing.description,
  };
}

export class CategoryService {
  constructor(private readonly repo: CategoryRepository) {}

  getAll(): Promise<Category[]> {
    return this.repo.getAll();
  }

  getById(id: number): Promise<Category> {
    return this.repo.getById(id);
  }

  create(input: NewCategory): Promise<Category> {
    return this.repo.create(input);
  }

  /**
   * Merge the patch onto the stored category and persist it
   *
   * @throws {NotFoundError} When the category is missing or soft-deleted
   */
  async update(id: number, patch: CategoryPatch): Promise<Category> {
    const existing = await this.repo.getById(id);
    return this.repo.update(mergeCategory(existing, patch));
  }

  delete(id: number): Promise<void> {
    return this.repo.delete(id);
  }
}
