import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hono } from 'hono';
import { createApp } from '../app.js';
import { SqliteLockStore, openLockDatabase } from '../domains/lock/store/sqlite-lock-store.js';
import { ExpiryPolicy } from '../domains/lock/policy/expiry-policy.js';
import { LockManager } from '../domains/lock/services/lock-manager.js';
import { LifecycleHooks } from '../domains/lock/services/lifecycle-hooks.js';
import { StoreUnavailableError } from '../shared/errors/index.js';
import { ManualClock, StaticPermissions, FAST_RETRY } from './helpers.js';

const ADMINS = new Set(['root']);

function request(app: Hono, method: string, path: string, userId?: string, body?: unknown) {
  const headers: Record<string, string> = {};
  if (userId) headers['X-User-Id'] = userId;
  if (body !== undefined) headers['Content-Type'] = 'application/json';
  return app.request(path, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

describe('lock API', () => {
  let store: SqliteLockStore;
  let clock: ManualClock;
  let manager: LockManager;
  let app: Hono;

  beforeEach(() => {
    store = new SqliteLockStore(openLockDatabase(':memory:'));
    clock = new ManualClock(0);
    manager = new LockManager(
      store,
      new ExpiryPolicy({ ttlMs: 900_000 }),
      new StaticPermissions().allow('alice').allow('bob').allow('root'),
      clock,
      { retry: FAST_RETRY }
    );
    app = createApp({
      lockManager: manager,
      lifecycleHooks: new LifecycleHooks(manager),
      isAdmin: (userId) => ADMINS.has(userId),
      apiKeys: [],
      corsOrigins: ['http://localhost:3000'],
    });
  });

  afterEach(() => {
    store.close();
  });

  it('reports health without identity', async () => {
    const res = await request(app, 'GET', '/api/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('requires a user id on lock routes', async () => {
    const res = await request(app, 'POST', '/api/locks/conference:42');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: 'User identity required. Pass X-User-Id header.',
      code: 'UNAUTHORIZED',
    });
  });

  it('rejects unsafe resource ids', async () => {
    const res = await request(app, 'POST', '/api/locks/conference%2042', 'alice');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid resource_id: only alphanumeric characters, hyphens, underscores and colons are allowed',
    });
  });

  it('grants, reports conflict with holder and expiry, and releases', async () => {
    const granted = await request(app, 'POST', '/api/locks/conference:42', 'alice');
    expect(granted.status).toBe(200);
    expect(await granted.json()).toEqual({
      acquired: true,
      resource_id: 'conference:42',
      token: 1,
      expires_at: '1970-01-01T00:15:00.000Z',
      heartbeat_interval_ms: 300_000,
    });

    clock.set(10_000);
    const conflict = await request(app, 'POST', '/api/locks/conference:42', 'bob');
    expect(conflict.status).toBe(423);
    expect(await conflict.json()).toEqual({
      error: 'Resource is locked by another editor',
      resource_id: 'conference:42',
      holder_id: 'alice',
      expires_at: '1970-01-01T00:15:00.000Z',
    });

    const released = await request(app, 'DELETE', '/api/locks/conference:42', 'alice');
    expect(released.status).toBe(200);
    expect(await released.json()).toEqual({ released: true, resource_id: 'conference:42' });

    const again = await request(app, 'DELETE', '/locks/conference:42', 'alice');
    expect(again.status).toBe(200);
  });

  it('returns 403 for users without edit rights', async () => {
    await request(app, 'POST', '/api/locks/conference:42', 'alice');
    const res = await request(app, 'POST', '/api/locks/conference:42', 'mallory');
    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ error: 'You do not have permission to edit this resource' });
  });

  describe('renew', () => {
    it('extends the lock', async () => {
      await request(app, 'POST', '/api/locks/conference:42', 'alice');
      clock.set(800_000);

      const res = await request(app, 'PUT', '/api/locks/conference:42', 'alice', { token: 1 });
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ expires_at: '1970-01-01T00:28:20.000Z', token: 1 });
    });

    it('accepts an empty body', async () => {
      await request(app, 'POST', '/api/locks/conference:42', 'alice');
      const res = await request(app, 'PUT', '/api/locks/conference:42', 'alice');
      expect(res.status).toBe(200);
    });

    it('returns 409 for a non-holder', async () => {
      await request(app, 'POST', '/api/locks/conference:42', 'alice');
      const res = await request(app, 'PUT', '/api/locks/conference:42', 'bob');
      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ error: 'Lock is not held by you', resource_id: 'conference:42' });
    });

    it('returns 410 after expiry', async () => {
      await request(app, 'POST', '/api/locks/conference:42', 'alice');
      clock.set(1_000_000);
      const res = await request(app, 'PUT', '/api/locks/conference:42', 'alice');
      expect(res.status).toBe(410);
    });

    it('validates the token', async () => {
      const res = await request(app, 'PUT', '/api/locks/conference:42', 'alice', { token: 'abc' });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'token must be a positive integer', code: 'VALIDATION_ERROR' });
    });
  });

  it('exposes public status', async () => {
    expect(await (await request(app, 'GET', '/api/locks/conference:42', 'bob')).json()).toEqual({
      resource_id: 'conference:42',
      state: 'absent',
    });

    await request(app, 'POST', '/api/locks/conference:42', 'alice');
    expect(await (await request(app, 'GET', '/api/locks/conference:42', 'bob')).json()).toEqual({
      resource_id: 'conference:42',
      state: 'active',
      holder_id: 'alice',
      expires_at: '1970-01-01T00:15:00.000Z',
    });

    clock.set(900_000);
    expect(await (await request(app, 'GET', '/api/locks/conference:42', 'bob')).json()).toEqual({
      resource_id: 'conference:42',
      state: 'expired',
      last_holder_id: 'alice',
    });
  });

  it('lists the caller\'s locks and restricts other holders to admins', async () => {
    await request(app, 'POST', '/api/locks/conference:1', 'alice');

    const mine = await request(app, 'GET', '/api/locks', 'alice');
    expect(await mine.json()).toEqual({
      holder_id: 'alice',
      locks: [{
        resource_id: 'conference:1',
        token: 1,
        acquired_at: '1970-01-01T00:00:00.000Z',
        last_renewed_at: '1970-01-01T00:00:00.000Z',
        expires_at: '1970-01-01T00:15:00.000Z',
      }],
    });

    expect((await request(app, 'GET', '/api/locks?holder=alice', 'bob')).status).toBe(403);
    expect((await request(app, 'GET', '/api/locks?holder=alice', 'root')).status).toBe(200);
  });

  describe('admin', () => {
    it('force-releases for admins only', async () => {
      await request(app, 'POST', '/api/locks/conference:42', 'alice');

      const denied = await request(app, 'DELETE', '/api/admin/locks/conference:42', 'bob');
      expect(denied.status).toBe(403);
      expect(await denied.json()).toEqual({ error: 'Admin rights required', code: 'FORBIDDEN' });

      const forced = await request(app, 'DELETE', '/api/admin/locks/conference:42', 'root');
      expect(forced.status).toBe(200);
      expect(await forced.json()).toEqual({ released: true, forced: true, resource_id: 'conference:42' });

      const next = await request(app, 'POST', '/api/locks/conference:42', 'bob');
      expect(next.status).toBe(200);
    });
  });

  describe('lifecycle', () => {
    it('cascades user removal', async () => {
      await request(app, 'POST', '/api/locks/conference:1', 'alice');
      await request(app, 'POST', '/api/locks/conference:2', 'alice');

      const res = await request(app, 'POST', '/api/lifecycle/users/alice/removed', 'root', {
        resource_ids: ['conference:3'],
      });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        user_id: 'alice',
        resource_ids: ['conference:1', 'conference:2', 'conference:3'],
        released: 2,
      });

      const next = await request(app, 'POST', '/api/locks/conference:1', 'bob');
      expect(next.status).toBe(200);
    });

    it('restricts user removal to admins', async () => {
      const res = await request(app, 'POST', '/api/lifecycle/users/alice/removed', 'bob');
      expect(res.status).toBe(403);
    });

    it('rejects malformed resource lists', async () => {
      const res = await request(app, 'POST', '/api/lifecycle/users/alice/removed', 'root', {
        resource_ids: 'conference:1',
      });
      expect(res.status).toBe(400);
    });

    it('rejects a body that is not JSON instead of ignoring it', async () => {
      await request(app, 'POST', '/api/locks/conference:3', 'bob');

      const res = await app.request('/api/lifecycle/users/alice/removed', {
        method: 'POST',
        headers: { 'X-User-Id': 'root', 'Content-Type': 'application/json' },
        body: '{"resource_ids": ["conference:3"',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Request body must be valid JSON', code: 'VALIDATION_ERROR' });
      expect(await manager.statusOf('conference:3')).toMatchObject({ kind: 'active', holderId: 'bob' });
    });

    it('bars a removed user until an admin restores them', async () => {
      await request(app, 'POST', '/api/lifecycle/users/alice/removed', 'root');
      expect((await request(app, 'POST', '/api/locks/conference:1', 'alice')).status).toBe(403);

      expect((await request(app, 'POST', '/api/lifecycle/users/alice/restored', 'bob')).status).toBe(403);
      const res = await request(app, 'POST', '/api/lifecycle/users/alice/restored', 'root');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ user_id: 'alice', reinstated: true });

      expect((await request(app, 'POST', '/api/locks/conference:1', 'alice')).status).toBe(200);
    });

    it('releases on session end for the user themselves', async () => {
      await request(app, 'POST', '/api/locks/conference:1', 'alice');

      const res = await request(app, 'POST', '/api/lifecycle/users/alice/session-ended', 'alice');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        user_id: 'alice',
        released: ['conference:1'],
        not_held: [],
        failed: [],
      });

      expect((await request(app, 'POST', '/api/lifecycle/users/alice/session-ended', 'bob')).status).toBe(403);
    });
  });

  it('maps a store outage to 503', async () => {
    vi.spyOn(store, 'tryAcquire').mockRejectedValue(new StoreUnavailableError('acquire'));

    const res = await request(app, 'POST', '/api/locks/conference:42', 'alice');
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: 'Lock store unavailable during acquire',
      code: 'STORE_UNAVAILABLE',
    });
  });

  it('hides unexpected failures behind a 500', async () => {
    vi.spyOn(store, 'status').mockRejectedValue(new TypeError('The database connection is not open'));

    const res = await request(app, 'GET', '/api/locks/conference:42', 'alice');
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
  });
});

describe('API keys', () => {
  it('checks X-API-Key when keys are configured', async () => {
    const store = new SqliteLockStore(openLockDatabase(':memory:'));
    const manager = new LockManager(store, new ExpiryPolicy(), new StaticPermissions().allow('alice'), new ManualClock());
    const app = createApp({
      lockManager: manager,
      lifecycleHooks: new LifecycleHooks(manager),
      isAdmin: () => false,
      apiKeys: ['test-key'],
      corsOrigins: [],
    });

    const missing = await app.request('/api/health');
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: 'API key required. Pass X-API-Key header.', code: 'UNAUTHORIZED' });

    const wrong = await app.request('/api/health', { headers: { 'X-API-Key': 'wrong' } });
    expect(wrong.status).toBe(403);
    expect(await wrong.json()).toEqual({ error: 'Invalid API key', code: 'FORBIDDEN' });
    expect((await app.request('/api/health', { headers: { 'X-API-Key': 'test-key' } })).status).toBe(200);
    store.close();
  });
});
