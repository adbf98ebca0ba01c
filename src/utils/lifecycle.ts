import type { Lifecycle } from "../types.js";
import { parseTimestamp } from "./time.js";

const ACTIVE: Lifecycle = { state: "active" };

export function lifecycleFromColumn(deletedAt: string | null): Lifecycle {
  return deletedAt === null ? ACTIVE : { state: "deleted", at: parseTimestamp(deletedAt) };
}

/**
 * Wire form of the lifecycle: null while active, ISO-8601 once deleted
 */
export function deletedAtOf(lifecycle: Lifecycle): string | null {
  return lifecycle.state === "deleted" ? lifecycle.at.toISOString() : null;
}
