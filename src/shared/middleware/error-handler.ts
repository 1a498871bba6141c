import type { ErrorHandler } from 'hono';
import { AppLockError } from '../errors/index.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('api');

/** Maps domain errors to their status; anything else is a 500. */
export const handleApiError: ErrorHandler = (err, c) => {
  if (err instanceof AppLockError) {
    if (err.statusCode >= 500) log.error({ err }, 'request failed');
    return c.json({ error: err.message, code: err.code }, err.statusCode);
  }

  log.error({ err, path: c.req.path }, 'unhandled error');
  return c.json({ error: 'Internal server error' }, 500);
};
