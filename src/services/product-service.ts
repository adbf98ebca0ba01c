import type { ProductRepository } from "../repositories/product-repository.js";
import type { NewProduct, Product, ProductPatch } from "../types.js";

// An empty name keeps the stored one; numbers replace whenever present
export function mergeProduct(existing: Product, patch: ProductPatch): Product {
  return {
    id: existing.id,
    name: patch.name ? patch.name : existing.name,
    price: patch.price ?? existing.price,
    stock: patch.stock ?? existing.stock,
    categoryId: patch.categoryId ?? existing.categoryId,
    lifecycle: existing.lifecycle,
  };
}

export class ProductService {
  constructor(private readonly repo: ProductRepository) {}

  getAll(): Promise<Product[]> {
    return this.repo.getAll();
  }

  getById(id: number): Promise<Product> {
    return this.repo.getById(id);
  }

  create(input: NewProduct): Promise<Product> {
    return this.repo.create(input);
  }

  // The embedded category from getById is dropped; update returns the bare row
  async update(id: number, patch: ProductPatch): Promise<Product> {
    const existing = await this.repo.getById(id);
    return this.repo.update(mergeProduct(existing, patch));
  }

  delete(id: number): Promise<void> {
    return this.repo.delete(id);
  }
}
