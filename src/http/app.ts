import cors from "cors";
import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { errorMessage } from "../errors.js";
import { CategoryHandler } from "../handlers/category-handler.js";
import { health } from "../handlers/health-handler.js";
import { ProductHandler } from "../handlers/product-handler.js";
import { ReportHandler } from "../handlers/report-handler.js";
import { CategoryRepository } from "../repositories/category-repository.js";
import { ProductRepository } from "../repositories/product-repository.js";
import { ReportRepository } from "../repositories/report-repository.js";
import { CategoryService } from "../services/category-service.js";
import { ProductService } from "../services/product-service.js";
import { ReportService } from "../services/report-service.js";
import type { Sqlite } from "../types.js";
import { type Logger, createLogger } from "../utils/logger.js";
import { failed, writeJSON } from "./response.js";

export interface AppOptions {
  db: Sqlite;
  logger?: Logger;
}

const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : undefined;
}

const methodNotAllowed: RequestHandler = (_req, res) => {
  writeJSON(res, 405, failed("Method not allowed"));
};

/**
 * Wire repositories, services and handlers onto an express app
 *
 * Routes live under `/api`, except `/health`.
 */
export function createApp({ db, logger = createLogger() }: AppOptions): Express {
  const categories = new CategoryHandler(new CategoryService(new CategoryRepository(db)), logger);
  const products = new ProductHandler(new ProductService(new ProductRepository(db)), logger);
  const reports = new ReportHandler(new ReportService(new ReportRepository(db)), logger);

  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use((req, res, next) => {
    res.on("finish", () => logger.debug(`${req.method} ${req.originalUrl} -> ${res.statusCode}`));
    next();
  });

  app.get("/health", health);

  const api = express.Router();

  api
    .route("/category")
    .get(asyncRoute(categories.getCategories))
    .post(asyncRoute(categories.createCategory))
    .all(methodNotAllowed);
  api
    .route("/category/:id")
    .get(asyncRoute(categories.getCategoryById))
    .put(asyncRoute(categories.updateCategory))
    .delete(asyncRoute(categories.deleteCategory))
    .all(methodNotAllowed);

  api
    .route("/product")
    .get(asyncRoute(products.getProducts))
    .post(asyncRoute(products.createProduct))
    .all(methodNotAllowed);
  api
    .route("/product/:id")
    .get(asyncRoute(products.getProductById))
    .put(asyncRoute(products.updateProduct))
    .delete(asyncRoute(products.deleteProduct))
    .all(methodNotAllowed);

  api.route("/report/today").get(asyncRoute(reports.getDailyReport)).all(methodNotAllowed);
  api.route("/report").get(asyncRoute(reports.getReportByRange)).all(methodNotAllowed);

  app.use("/api", api);

  app.use((_req, res) => {
    writeJSON(res, 404, failed("Route not found"));
  });

  // Bodies refused by express.json() (malformed, too large, bad charset) carry a 4xx status
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== undefined) {
      writeJSON(res, status, failed("Invalid request body"));
      return;
    }

    logger.error("Unhandled request error:", error);
    writeJSON(res, 500, failed(`Internal server error: ${errorMessage(error)}`));
  });

  return app;
}
