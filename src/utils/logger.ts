import type { LogLevel } from "../types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: "🔍",
  info: "ℹ️ ",
  warn: "⚠️ ",
  error: "❌",
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger filtered by minimum level
 *
 * Debug and info lines go to stdout, warnings and errors to stderr.
 */
export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];

  const write = (target: LogLevel, message: string, details: unknown[]) => {
    if (!enabled(target)) return;
    const line = `${LEVEL_PREFIX[target]} ${message}`;
    if (target === "warn" || target === "error") {
      console.error(line, ...details);
    } else {
      console.log(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
  };
}

/** Logger that drops everything; used by tests */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
