import type { Request, Response, NextFunction } from 'express';
import { ChatError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/** Set by express.json() on a body it cannot parse. */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ChatError) {
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }
  if (isBodyParseError(err)) {
    res.status(400).json({ error: 'Invalid JSON body', code: 'VALIDATION_FAILED' });
    return;
  }
  logger.error('[Switchboard Error]', err.message, err.stack);
  res.status(500).json({
    error: err.message || 'Internal Server Error',
    code: 'INTERNAL_ERROR',
  });
}
