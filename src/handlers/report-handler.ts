import type { Request, Response } from "express";
import { ValidationError } from "../errors.js";
import { respondWithError, success, writeJSON } from "../http/response.js";
import { salesReportJson } from "../http/serializers.js";
import type { ReportService } from "../services/report-service.js";
import type { Logger } from "../utils/logger.js";

const MESSAGES = { notFound: "Report not found", failure: "Failed to fetch report" };

export class ReportHandler {
  constructor(
    private readonly service: ReportService,
    private readonly logger: Logger
  ) {}

  getDailyReport = async (_req: Request, res: Response): Promise<void> => {
    try {
      const report = await this.service.getDailyReport();
      writeJSON(res, 200, success("Report retrieved successfully", salesReportJson(report)));
    } catch (error) {
      respondWithError(res, error, MESSAGES, this.logger);
    }
  };

  // GET /api/report?start_date=YYYY-MM-DD&end_date=YYYY-MM-DD
  getReportByRange = async (req: Request, res: Response): Promise<void> => {
    try {
      const { start_date: startDate, end_date: endDate } = req.query;
      if (typeof startDate !== "string" || typeof endDate !== "string") {
        throw new ValidationError("start_date and end_date query parameters are required");
      }

      const report = await this.service.getReportByRange(startDate, endDate);
      writeJSON(res, 200, success("Report retrieved successfully", salesReportJson(report)));
    } catch (error) {
      respondWithError(res, error, MESSAGES, this.logger);
    }
  };
}
