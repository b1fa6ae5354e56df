import { Hono } from 'hono';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { LifecycleHooks } from '../services/lifecycle-hooks.js';
import type { AdminCheck } from './routes.js';
import { requireUser, type AppEnv } from '../../../shared/middleware/auth.js';
import { sanitizeId } from '../../../shared/middleware/sanitize.js';
import { ForbiddenError, ValidationError } from '../../../shared/errors/index.js';

const LifecycleBody = Type.Object({
  resource_ids: Type.Optional(Type.Array(Type.String({ pattern: '^[a-zA-Z0-9_:-]{1,128}$' }))),
});

/** An empty body means "no list supplied"; anything else must be valid JSON. */
async function readResourceIds(body: Promise<string>): Promise<string[] | undefined> {
  const raw = (await body).trim();
  if (raw === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
  if (!Value.Check(LifecycleBody, parsed)) {
    throw new ValidationError('resource_ids must be an array of resource ids');
  }
  return parsed.resource_ids;
}

/**
 * Entry points for the user-removal and logout workflows.
 */
export function createLifecycleRoutes(hooks: LifecycleHooks, isAdmin: AdminCheck): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use('*', requireUser());

  // POST /lifecycle/users/:user/removed
  app.post('/users/:user/removed', async (c) => {
    const caller = c.get('userId');
    if (!isAdmin(caller)) {
      throw new ForbiddenError('Admin rights required');
    }
    const userId = sanitizeId(c.req.param('user'), 'user_id');
    const resourceIds = await readResourceIds(c.req.text());

    const result = await hooks.onUserRemoved(userId, resourceIds, caller);
    return c.json({ user_id: userId, resource_ids: result.resourceIds, released: result.released });
  });

  // POST /lifecycle/users/:user/restored
  app.post('/users/:user/restored', async (c) => {
    const caller = c.get('userId');
    if (!isAdmin(caller)) {
      throw new ForbiddenError('Admin rights required');
    }
    const userId = sanitizeId(c.req.param('user'), 'user_id');

    const result = await hooks.onUserRestored(userId, caller);
    return c.json({ user_id: userId, reinstated: result.reinstated });
  });

  // POST /lifecycle/users/:user/session-ended
  app.post('/users/:user/session-ended', async (c) => {
    const caller = c.get('userId');
    const userId = sanitizeId(c.req.param('user'), 'user_id');
    if (caller !== userId && !isAdmin(caller)) {
      throw new ForbiddenError('Only the session owner or an admin can end a session');
    }
    const resourceIds = await readResourceIds(c.req.text());

    const result = await hooks.onSessionEnded(userId, resourceIds);
    return c.json({
      user_id: userId,
      released: result.released,
      not_held: result.notHeld,
      failed: result.failed.map(f => ({ resource_id: f.resourceId, error: f.error })),
    });
  });

  return app;
}
