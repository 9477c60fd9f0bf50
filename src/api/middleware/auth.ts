/**
 * API Key Authentication Middleware
 * Protects the control API when an API key is configured
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Middleware validating the X-API-Key header against `expectedKey`
 * Returns 401 if the key is missing or wrong; with no key configured the API is open
 */
export function apiKeyAuth(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      next();
      return;
    }

    const apiKey = req.headers['x-api-key'];
    if (!apiKey || apiKey !== expectedKey) {
      res.status(401).json({ error: 'Unauthorized: Invalid API key' });
      return;
    }

    next();
  };
}
