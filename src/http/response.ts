import type { Response } from "express";
import { NotFoundError, ValidationError, errorMessage } from "../errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * Uniform body of every API response
 */
export interface Envelope {
  status: "success" | "failed";
  message: string;
  /** Omitted from the JSON when undefined */
  data?: unknown;
}

export const success = (message: string, data?: unknown): Envelope => ({ status: "success", message, data });

export const failed = (message: string): Envelope => ({ status: "failed", message });

export function writeJSON(res: Response, status: number, body: Envelope): void {
  res.status(status).json(body);
}

export interface ErrorMessages {
  /** Message for a 404, e.g. "Category not found" */
  notFound: string;
  /** Prefix for a 500, e.g. "Failed to fetch category" */
  failure: string;
}

/**
 * Translate an error raised while serving a request into an envelope
 */
export function respondWithError(res: Response, error: unknown, messages: ErrorMessages, logger: Logger): void {
  if (error instanceof ValidationError) {
    writeJSON(res, 400, failed(error.message));
    return;
  }

  if (error instanceof NotFoundError) {
    writeJSON(res, 404, failed(messages.notFound));
    return;
  }

  logger.error(`${messages.failure}:`, error);
  writeJSON(res, 500, failed(`${messages.failure}: ${errorMessage(error)}`));
}
