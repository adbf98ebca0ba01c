import type { z } from "zod";
import { ValidationError } from "../errors.js";

const NUMERIC_ID = /^\d+$/;

/**
 * Parse a path segment into an entity id
 *
 * @throws {ValidationError} `Invalid <entity> ID` for anything but digits
 */
export function parseId(raw: string | undefined, entity: string): number {
  const id = raw !== undefined && NUMERIC_ID.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(id)) {
    throw new ValidationError(`Invalid ${entity} ID`);
  }
  return id;
}

/**
 * Validate a decoded JSON body against a zod schema
 *
 * @throws {ValidationError} Naming each offending field
 */
export function parseBody<Schema extends z.ZodTypeAny>(schema: Schema, body: unknown): z.output<Schema> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ValidationError(`Invalid request body: ${problems}`);
  }
  return parsed.data;
}
