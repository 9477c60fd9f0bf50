/**
 * Error Handler Middleware
 * Global error handling for Express
 */

import { Request, Response, NextFunction } from 'express';
import { DispatchEngineError } from '../../domain/errors';

/**
 * Error response structure
 */
interface ErrorResponse {
  error: string;
  message: string;
  status: number;
  timestamp: string;
}

/**
 * HTTP status of an error: engine errors carry their own, body-parser
 * errors carry `status`, everything else is a 500
 */
function statusOf(err: Error): number {
  if (err instanceof DispatchEngineError) return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

/**
 * Global error handler middleware
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = statusOf(err);
  if (status >= 500) {
    console.error('Error occurred:', err);
  } else {
    console.warn(`Request failed (${status}): ${err.message}`);
  }

  const errorResponse: ErrorResponse = {
    error: err.name || 'Error',
    message: status >= 500 && !(err instanceof DispatchEngineError)
      ? 'Internal server error'
      : err.message,
    status,
    timestamp: new Date().toISOString(),
  };

  res.status(status).json(errorResponse);
}

/**
 * Not found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not Found',
    message: `Route ${req.method} ${req.path} not found`,
    status: 404,
    timestamp: new Date().toISOString(),
  });
}
