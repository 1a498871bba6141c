import { Hono } from 'hono';
import { createAuthMiddleware } from './shared/middleware/auth.js';
import { handleApiError } from './shared/middleware/error-handler.js';
import { createPolicyRoutes } from './domains/policy/api/routes.js';
import type { PolicyService } from './domains/policy/service/policy-service.js';
import { createLockRoutes } from './domains/lock/api/routes.js';
import type { LockCoordinator } from './domains/lock/services/lock-coordinator.js';
import type { ProcessWatcherStatus } from './infrastructure/process/types.js';

export const VERSION = '1.0.0';

export interface ApiDependencies {
  policyService: PolicyService;
  coordinator: LockCoordinator;
  apiKeys: string[];
  watcherStatus?: () => ProcessWatcherStatus;
}

/** Control API, mounted under /api. */
export function createApi(deps: ApiDependencies): Hono {
  const apiApp = new Hono();

  apiApp.get('/health', (c) => c.json({ status: 'ok', version: VERSION }));
  apiApp.route('/lock', createLockRoutes(deps.coordinator, { watcherStatus: deps.watcherStatus }));
  apiApp.route('/policy', createPolicyRoutes(deps.policyService));
  apiApp.onError(handleApiError);

  const guarded = new Hono();
  guarded.use('*', createAuthMiddleware(deps.apiKeys));
  guarded.route('/', apiApp);

  const app = new Hono();
  app.route('/api', guarded);
  app.onError(handleApiError);
  return app;
}
