import { timingSafeEqual } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';

/**
 * Guards the control API with static keys passed as `X-API-Key`
 * or `Authorization: Bearer <key>`. No keys configured → open.
 */
export function createAuthMiddleware(apiKeys: string[]): MiddlewareHandler {
  if (apiKeys.length === 0) {
    return async (_, next) => await next();
  }

  const accepted = apiKeys.map((key) => Buffer.from(key, 'utf8'));

  return async (c, next) => {
    const providedKey = c.req.header('X-API-Key') ?? bearerToken(c.req.header('Authorization'));

    if (!providedKey) {
      return c.json({ error: 'API key required. Pass X-API-Key header.' }, 401);
    }

    const provided = Buffer.from(providedKey, 'utf8');
    const match = accepted.some(
      (key) => key.length === provided.length && timingSafeEqual(key, provided)
    );
    if (!match) {
      return c.json({ error: 'Invalid API key' }, 403);
    }

    await next();
  };
}

function bearerToken(header: string | undefined): string | undefined {
  if (!header) return undefined;
  const m = /^Bearer\s+(.+)$/i.exec(header.trim());
  return m?.[1];
}
