import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("should apply defaults for PORT and LOG_LEVEL", () => {
    expect(loadConfig({ DATABASE_URL: "kasir.db" })).toEqual({
      databaseUrl: "kasir.db",
      port: 8080,
      logLevel: "info",
    });
  });

  it("should read every variable", () => {
    expect(loadConfig({ DATABASE_URL: ":memory:", PORT: "3000", LOG_LEVEL: "debug" })).toEqual({
      databaseUrl: ":memory:",
      port: 3000,
      logLevel: "debug",
    });
  });

  it("should treat an empty PORT as unset", () => {
    expect(loadConfig({ DATABASE_URL: "kasir.db", PORT: "" }).port).toBe(8080);
  });

  it("should require DATABASE_URL", () => {
    expect(() => loadConfig({})).toThrow("Invalid configuration: DATABASE_URL: Required");
  });

  it("should reject a port out of range", () => {
    expect(() => loadConfig({ DATABASE_URL: "kasir.db", PORT: "70000" })).toThrow(/^Invalid configuration: PORT: /);
  });
});
