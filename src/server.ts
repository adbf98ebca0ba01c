import type { Server } from "http";
import { openDatabase } from "./db/client.js";
import { createApp } from "./http/app.js";
import type { KasirConfig } from "./types.js";
import type { Logger } from "./utils/logger.js";

export interface RunningServer {
  server: Server;
  close(): Promise<void>;
}

/**
 * Open the store and start listening
 *
 * @throws {StoreError} When the database cannot be opened; nothing is started
 * @throws When the port cannot be bound; the database is closed again
 */
export async function startServer(config: KasirConfig, logger: Logger): Promise<RunningServer> {
  const database = openDatabase(config.databaseUrl);
  logger.info("Successfully connected to database");

  const app = createApp({ db: database.db, logger });

  let server: Server;
  try {
    server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(config.port, () => resolve(listening));
      listening.once("error", reject);
    });
  } catch (error) {
    database.close();
    throw error;
  }
  logger.info(`Server running on http://localhost:${config.port}`);

  return {
    server,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => {
          database.close();
          if (error) reject(error);
          else resolve();
        });
      }),
  };
}
