import { Hono } from 'hono';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { LockManager } from '../services/lock-manager.js';
import { mapConflict, mapGranted, mapHeldLock, mapStatus } from './response-mapper.js';
import { requireUser, type AppEnv } from '../../../shared/middleware/auth.js';
import { sanitizeId } from '../../../shared/middleware/sanitize.js';
import { ForbiddenError, ValidationError } from '../../../shared/errors/index.js';

export type AdminCheck = (userId: string) => boolean;

const RenewBody = Type.Object({
  token: Type.Optional(Type.Integer({ minimum: 1 })),
});

const PERMISSION_DENIED = { error: 'You do not have permission to edit this resource' };

export function createLockRoutes(lockManager: LockManager, isAdmin: AdminCheck): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use('*', requireUser());

  // GET /locks?holder= - Active locks of the caller (or of another user, for admins)
  app.get('/', async (c) => {
    const userId = c.get('userId');
    const holder = sanitizeId(c.req.query('holder') || userId, 'holder');
    if (holder !== userId && !isAdmin(userId)) {
      throw new ForbiddenError('Only admins can list other users\' locks');
    }

    const locks = await lockManager.locksHeldBy(holder);
    return c.json({ holder_id: holder, locks: locks.map(mapHeldLock) });
  });

  // POST /locks/:resource - Acquire
  app.post('/:resource', async (c) => {
    const resourceId = sanitizeId(c.req.param('resource'), 'resource_id');
    const result = await lockManager.acquireLock(resourceId, c.get('userId'));

    switch (result.kind) {
      case 'granted':
        return c.json(mapGranted(resourceId, result));
      case 'conflict':
        return c.json(mapConflict(resourceId, result.holderId, result.expiresAt), 423);
      case 'permission_denied':
        return c.json(PERMISSION_DENIED, 403);
    }
  });

  // PUT /locks/:resource - Renew (heartbeat)
  app.put('/:resource', async (c) => {
    const resourceId = sanitizeId(c.req.param('resource'), 'resource_id');
    const body: unknown = await c.req.json().catch(() => ({}));
    if (!Value.Check(RenewBody, body)) {
      throw new ValidationError('token must be a positive integer');
    }

    const result = await lockManager.renewLock(resourceId, c.get('userId'), body.token);
    switch (result.kind) {
      case 'granted':
        return c.json(mapGranted(resourceId, result));
      case 'not_holder':
        return c.json({ error: 'Lock is not held by you', resource_id: resourceId }, 409);
      case 'expired':
        return c.json({ error: 'Lock expired; acquire it again', resource_id: resourceId }, 410);
      case 'permission_denied':
        return c.json(PERMISSION_DENIED, 403);
    }
  });

  // DELETE /locks/:resource - Release
  app.delete('/:resource', async (c) => {
    const resourceId = sanitizeId(c.req.param('resource'), 'resource_id');
    const result = await lockManager.releaseLock(resourceId, c.get('userId'));

    if (result.kind === 'not_holder') {
      return c.json({ error: 'Lock is not held by you', resource_id: resourceId }, 409);
    }
    return c.json({ released: true, resource_id: resourceId });
  });

  // GET /locks/:resource - Public status
  app.get('/:resource', async (c) => {
    const resourceId = sanitizeId(c.req.param('resource'), 'resource_id');
    const status = await lockManager.statusOf(resourceId);
    return c.json(mapStatus(resourceId, status));
  });

  return app;
}

export function createAdminLockRoutes(lockManager: LockManager, isAdmin: AdminCheck): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.use('*', requireUser());
  app.use('*', async (c, next) => {
    if (!isAdmin(c.get('userId'))) {
      throw new ForbiddenError('Admin rights required');
    }
    await next();
  });

  // DELETE /admin/locks/:resource - Force release
  app.delete('/locks/:resource', async (c) => {
    const resourceId = sanitizeId(c.req.param('resource'), 'resource_id');
    await lockManager.forceReleaseLock(resourceId, { actorId: c.get('userId'), reason: 'admin' });
    return c.json({ released: true, forced: true, resource_id: resourceId });
  });

  return app;
}
