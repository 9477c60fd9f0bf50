/**
 * Domain Errors
 * Error taxonomy shared by the engine, the worker and the HTTP layer
 */

/**
 * Base class; `statusCode` is what the HTTP error handler responds with
 */
export abstract class DispatchEngineError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed input: invoice file, terms code, request body. Never retried.
 */
export class ValidationError extends DispatchEngineError {
  readonly statusCode = 400;
}

/**
 * Recipient cannot receive a statement (no members, no rows, no email)
 */
export class RecipientError extends DispatchEngineError {
  readonly statusCode = 422;
}

/**
 * Delivery failed in transit or was rejected by the mail service
 */
export class TransportError extends DispatchEngineError {
  readonly statusCode = 502;
}

/**
 * Invoice snapshot missing or unreadable
 */
export class SystemError extends DispatchEngineError {
  readonly statusCode = 503;
}

export class NotFoundError extends DispatchEngineError {
  readonly statusCode = 404;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
