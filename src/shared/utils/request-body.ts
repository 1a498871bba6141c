import type { Context } from 'hono';
import { ValidationError } from '../errors/index.js';

/**
 * Parse the request body as JSON. A malformed body is a ValidationError;
 * an empty one yields `whenEmpty` where the route allows it.
 */
export async function readJson(c: Context, options: { whenEmpty?: unknown } = {}): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim() && 'whenEmpty' in options) return options.whenEmpty;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new ValidationError('request body must be JSON');
  }
}
