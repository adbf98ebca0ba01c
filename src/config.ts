import { z } from "zod";
import type { KasirConfig } from "./types.js";

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1, "DATABASE_URL is required"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/**
 * Build the server configuration from environment variables
 *
 * @param env - Variables to read (default: process.env)
 * @throws {Error} Listing every invalid key when validation fails
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KasirConfig {
  const parsed = envSchema.safeParse({
    DATABASE_URL: env.DATABASE_URL,
    // An empty PORT falls back to the default instead of failing coercion
    PORT: env.PORT === "" ? undefined : env.PORT,
    LOG_LEVEL: env.LOG_LEVEL === "" ? undefined : env.LOG_LEVEL,
  });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
