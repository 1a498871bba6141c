import { Hono } from 'hono';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { LockCoordinator } from '../services/lock-coordinator.js';
import type { ProcessWatcherStatus } from '../../../infrastructure/process/types.js';
import { parseProcessEvent } from '../../../infrastructure/process/event-parser.js';
import { ValidationError } from '../../../shared/errors/index.js';
import { readJson } from '../../../shared/utils/request-body.js';

const RelockSchema = Type.Object({ app: Type.Optional(Type.String({ minLength: 1 })) });

export interface LockRoutesOptions {
  /** Reported under `watcher` in the status response */
  watcherStatus?: () => ProcessWatcherStatus;
}

export function createLockRoutes(coordinator: LockCoordinator, options: LockRoutesOptions = {}): Hono {
  const app = new Hono();

  // GET /lock/status - sessions in flight and open grace windows
  app.get('/status', (c) => {
    const { sessions, grace } = coordinator.snapshot();
    return c.json({
      sessions: sessions.map((s) => ({
        app: s.appKey,
        process_id: s.processId,
        display_name: s.displayName,
        state: s.state,
        attempt: s.attempt,
        max_attempts: s.maxAttempts,
        started_at: new Date(s.startedAt).toISOString(),
      })),
      grace: grace.map((g) => ({
        app: g.appKey,
        verified_at: new Date(g.verifiedAt).toISOString(),
        remaining_ms: g.remainingMs,
      })),
      ...(options.watcherStatus ? { watcher: options.watcherStatus() } : {}),
    });
  });

  // POST /lock/events - push a process notification
  app.post('/events', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = parseProcessEvent(body);
    if (!parsed.ok) {
      return c.json({ error: 'Invalid process event', code: 'VALIDATION_ERROR', details: parsed.errors }, 400);
    }

    return c.json({ decision: coordinator.onEvent(parsed.event) });
  });

  // POST /lock/relock - end grace for one app (`{ "app": "chat-app" }`) or all
  app.post('/relock', async (c) => {
    const body = await readJson(c, { whenEmpty: {} });
    if (!Value.Check(RelockSchema, body)) {
      throw new ValidationError('app must be a non-empty string');
    }
    const target = body.app?.trim().toLowerCase();
    const cleared = coordinator.relock(target);
    return c.json({ relocked: target ?? 'all', cleared });
  });

  return app;
}
