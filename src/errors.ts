/**
 * Error taxonomy shared by repositories, services and handlers
 *
 * Handlers map `ValidationError` to 400 and `NotFoundError` to 404; anything
 * else becomes a 500 carrying the underlying message.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: string,
    public readonly id: number
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * Failure raised while opening or preparing the store
 */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
