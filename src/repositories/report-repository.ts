import { and, asc, desc, eq, gte, isNull, lte, sql } from "drizzle-orm";
import { product, transactionDetails, transactions } from "../schema/index.js";
import type { SalesReport, Sqlite } from "../types.js";
import { dayRange, formatDate } from "../utils/time.js";

export class ReportRepository {
  constructor(private readonly db: Sqlite) {}

  /**
   * Report for the calendar day containing `now`, in local time
   */
  async getDailyReport(now: Date = new Date()): Promise<SalesReport> {
    const today = formatDate(now);
    const { start, end } = dayRange(today, today);
    return this.getReportByRange(start, end);
  }

  /**
   * Aggregate non-deleted transactions created within `[start, end]`
   *
   * Both bounds are `YYYY-MM-DD HH:MM:SS` strings and compare lexically
   * against `created_at`. Ties for the top product go to the lowest product id.
   */
  async getReportByRange(start: string, end: string): Promise<SalesReport> {
    const inRange = and(
      gte(transactions.createdAt, start),
      lte(transactions.createdAt, end),
      isNull(transactions.deletedAt)
    );

    const [totals] = await this.db
      .select({
        totalRevenue: sql<number>`coalesce(sum(${transactions.totalAmount}), 0)`,
        totalTransactionCount: sql<number>`count(*)`,
      })
      .from(transactions)
      .where(inRange);

    const quantitySold = sql<number>`sum(${transactionDetails.quantity})`;
    const [top] = await this.db
      .select({ name: product.name, quantitySold })
      .from(transactionDetails)
      .innerJoin(transactions, eq(transactionDetails.transactionId, transactions.id))
      .innerJoin(product, eq(transactionDetails.productId, product.id))
      .where(inRange)
      .groupBy(product.id, product.name)
      .orderBy(desc(quantitySold), asc(product.id))
      .limit(1);

    return {
      totalRevenue: Number(totals?.totalRevenue ?? 0),
      totalTransactionCount: Number(totals?.totalTransactionCount ?? 0),
      topProduct: top ? { name: top.name, quantitySold: Number(top.quantitySold) } : null,
    };
  }
}
