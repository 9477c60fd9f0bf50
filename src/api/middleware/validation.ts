/**
 * Validation Middleware
 * Request validation helpers
 */

import { Request, Response, NextFunction } from 'express';

/**
 * Validate required fields in request body
 */
export function validateRequired(fields: string[]) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const body: Record<string, unknown> =
      typeof req.body === 'object' && req.body !== null ? req.body : {};
    const missingFields: string[] = [];

    for (const field of fields) {
      const value = body[field];
      if (value === undefined || value === null || value === '') {
        missingFields.push(field);
      }
    }

    if (missingFields.length > 0) {
      res.status(400).json({
        error: 'Validation Error',
        message: `Missing required fields: ${missingFields.join(', ')}`,
        status: 400,
      });
      return;
    }

    next();
  };
}

/**
 * Parse an optional positive integer query parameter
 *
 * @returns the number, the fallback when absent, or null when malformed
 */
export function parseLimit(value: unknown, fallback: number): number | null {
  if (value === undefined || value === '') return fallback;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}
