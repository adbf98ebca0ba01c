#!/usr/bin/env node

import "dotenv/config";
import { loadConfig } from "./config.js";
import { openDatabase } from "./db/client.js";
import { errorMessage } from "./errors.js";
import { startServer } from "./server.js";
import { createLogger } from "./utils/logger.js";

async function main() {
  const command = process.argv[2];

  switch (command) {
    case "serve":
      await runServe();
      break;
    case "migrate":
      runMigrate();
      break;
    default:
      console.log(`
kasir-api - Cashier back-office REST API

Usage:
  kasir-api serve       Start the HTTP server
  kasir-api migrate     Create the database tables and exit

Environment:
  DATABASE_URL          SQLite database file (required)
  PORT                  Listen port (default: 8080)
  LOG_LEVEL             debug | info | warn | error (default: info)
      `);
      process.exit(1);
  }
}

async function runServe() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  try {
    const running = await startServer(config, logger);
    const shutdown = () => {
      logger.info("Shutting down...");
      running.close().then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error("Shutdown failed:", errorMessage(error));
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    logger.error("Server failed to start:", errorMessage(error));
    process.exit(1);
  }
}

function runMigrate() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const database = openDatabase(config.databaseUrl);
  database.close();
  logger.info(`✅ Schema is up to date in ${config.databaseUrl}`);
}

main().catch((error) => {
  console.error("❌ Unexpected error:", errorMessage(error));
  process.exit(1);
});
