import { ValidationError } from "../errors.js";
import type { ReportRepository } from "../repositories/report-repository.js";
import type { SalesReport } from "../types.js";
import { dayRange, isCalendarDate } from "../utils/time.js";

export class ReportService {
  constructor(private readonly repo: ReportRepository) {}

  getDailyReport(now?: Date): Promise<SalesReport> {
    return this.repo.getDailyReport(now);
  }

  /**
   * Report from the start of `startDate` to the end of `endDate`, both `YYYY-MM-DD`
   *
   * @throws {ValidationError} When a date is malformed or the range is reversed
   */
  async getReportByRange(startDate: string, endDate: string): Promise<SalesReport> {
    if (!isCalendarDate(startDate) || !isCalendarDate(endDate)) {
      throw new ValidationError("start_date and end_date must be dates in YYYY-MM-DD format");
    }
    if (startDate > endDate) {
      throw new ValidationError("start_date must not be after end_date");
    }

    const { start, end } = dayRange(startDate, endDate);
    return this.repo.getReportByRange(start, end);
  }
}
