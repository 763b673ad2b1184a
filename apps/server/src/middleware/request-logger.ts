import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger.js';

/** Log method, path, status and duration of every request at debug level. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.debug(`[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
  });
  next();
}
