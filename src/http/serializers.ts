import type { Category, Product, SalesReport } from "../types.js";
import { deletedAtOf } from "../utils/lifecycle.js";

export interface CategoryJson {
  id: number;
  name: string;
  description: string;
  deleted_at: string | null;
}

export interface ProductJson {
  id: number;
  name: string;
  price: number;
  stock: number;
  category_id: number;
  category?: CategoryJson;
  deleted_at: string | null;
}

export interface SalesReportJson {
  total_revenue: number;
  total_transaction_count: number;
  top_product: { name: string; quantity_sold: number } | null;
}

export function categoryJson(category: Category): CategoryJson {
  return {
    id: category.id,
    name: category.name,
    description: category.description,
    deleted_at: deletedAtOf(category.lifecycle),
  };
}

export function productJson(product: Product): ProductJson {
  return {
    id: product.id,
    name: product.name,
    price: product.price,
    stock: product.stock,
    category_id: product.categoryId,
    ...(product.category ? { category: categoryJson(product.category) } : {}),
    deleted_at: deletedAtOf(product.lifecycle),
  };
}

export function salesReportJson(report: SalesReport): SalesReportJson {
  return {
    total_revenue: report.totalRevenue,
    total_transaction_count: report.totalTransactionCount,
    top_product: report.topProduct
      ? { name: report.topProduct.name, quantity_sold: report.topProduct.quantitySold }
      : null,
  };
}
