import * as t from "drizzle-orm/sqlite-core";
import { product } from "./product.js";

export const transactions = t.sqliteTable("transactions", {
  id: t.integer("id").primaryKey({ autoIncrement: true }),
  totalAmount: t.integer("total_amount").notNull(),
  createdAt: t.text("created_at").notNull(),
  deletedAt: t.text("deleted_at"),
});

export const transactionDetails = t.sqliteTable("transaction_details", {
  id: t.integer("id").primaryKey({ autoIncrement: true }),
  transactionId: t.integer("transaction_id").notNull().references(() => transactions.id),
  productId: t.integer("product_id").notNull().references(() => product.id),
  quantity: t.integer("quantity").notNull(),
  price: t.integer("price").notNull(),
  subtotal: t.integer("subtotal").notNull(),
});
