import * as t from "drizzle-orm/sqlite-core";

export const category = t.sqliteTable("category", {
  id: t.integer("id").primaryKey({ autoIncrement: true }),
  name: t.text("name", { length: 100 }).notNull(),
  description: t.text("description").default("").notNull(),
  deletedAt: t.text("deleted_at"),
});

export const product = t.sqliteTable("product", {
  id: t.integer("id").primaryKey({ autoIncrement: true }),
  name: t.text("name", { length: 100 }).notNull(),
  price: t.integer("price").notNull(),
  stock: t.integer("stock").default(0).notNull(),
  categoryId: t.integer("category_id").notNull().references(() => category.id),
  deletedAt: t.text("deleted_at"),
});

export type CategoryRow = typeof category.$inferSelect;
export type ProductRow = typeof product.$inferSelect;
