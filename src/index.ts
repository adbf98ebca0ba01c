// HTTP application
export { createApp } from "./http/app.js";
export type { AppOptions } from "./http/app.js";
export { startServer } from "./server.js";
export { writeJSON } from "./http/response.js";
export type { Envelope } from "./http/response.js";

// Persistence
export { openDatabase } from "./db/client.js";
export { migrate } from "./db/migrate.js";
export { CategoryRepository } from "./repositories/category-repository.js";
export { ProductRepository } from "./repositories/product-repository.js";
export { ReportRepository } from "./repositories/report-repository.js";

// Services
export { CategoryService } from "./services/category-service.js";
export { ProductService } from "./services/product-service.js";
export { ReportService } from "./services/report-service.js";

export { loadConfig } from "./config.js";
export { NotFoundError, StoreError, ValidationError } from "./errors.js";
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";

// Type definitions
export * from "./types.js";
