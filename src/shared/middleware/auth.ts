import type { MiddlewareHandler } from 'hono';
import { sanitizeId } from './sanitize.js';
import { ForbiddenError, UnauthorizedError } from '../errors/index.js';

/** Hono env carrying the authenticated caller. */
export type AppEnv = {
  Variables: {
    userId: string;
  };
};

export function createAuthMiddleware(apiKeys: string[]): MiddlewareHandler {
  // If no keys configured, allow all requests
  if (apiKeys.length === 0) {
    return async (_, next) => await next();
  }

  return async (c, next) => {
    const providedKey = c.req.header('X-API-Key');

    if (!providedKey) {
      throw new UnauthorizedError('API key required. Pass X-API-Key header.');
    }

    if (!apiKeys.includes(providedKey)) {
      throw new ForbiddenError('Invalid API key');
    }

    await next();
  };
}

/**
 * Reads the caller's user id from X-User-Id, set by the upstream gateway
 * after it authenticates the session.
 */
export function requireUser(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const userId = c.req.header('X-User-Id');
    if (!userId) {
      throw new UnauthorizedError('User identity required. Pass X-User-Id header.');
    }
    c.set('userId', sanitizeId(userId, 'user_id'));
    await next();
  };
}
