import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';

// Middleware
import { createAuthMiddleware, type AppEnv } from './shared/middleware/auth.js';

// Domain - Lock
import type { LockManager } from './domains/lock/services/lock-manager.js';
import type { LifecycleHooks } from './domains/lock/services/lifecycle-hooks.js';
import { createLockRoutes, createAdminLockRoutes, type AdminCheck } from './domains/lock/api/routes.js';
import { createLifecycleRoutes } from './domains/lock/api/lifecycle-routes.js';

import { LockServiceError } from './shared/errors/index.js';
import { createLogger } from './shared/logging/logger.js';

const log = createLogger('app');

export interface AppDeps {
  lockManager: LockManager;
  lifecycleHooks: LifecycleHooks;
  isAdmin: AdminCheck;
  apiKeys: string[];
  corsOrigins: string[];
}

export function createApp(deps: AppDeps): Hono {
  const apiApp = new Hono<AppEnv>();

  apiApp.get('/health', (c) => c.json({ status: 'ok' }));

  apiApp.route('/locks', createLockRoutes(deps.lockManager, deps.isAdmin));
  apiApp.route('/admin', createAdminLockRoutes(deps.lockManager, deps.isAdmin));
  apiApp.route('/lifecycle', createLifecycleRoutes(deps.lifecycleHooks, deps.isAdmin));

  // Main app mounts everything under /api and at the root
  const app = new Hono();
  app.use('*', cors({ origin: deps.corsOrigins, credentials: true }));
  app.use('*', createAuthMiddleware(deps.apiKeys));
  app.route('/api', apiApp);
  app.route('/', apiApp);

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof LockServiceError) {
      if (err.statusCode >= 500) {
        log.error({ err, path: c.req.path }, 'request failed');
      }
      return c.json({ error: err.message, code: err.code }, err.statusCode);
    }
    log.error({ err, path: c.req.path }, 'unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
