import { Hono } from 'hono';
import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { PolicyService } from '../service/policy-service.js';
import { ValidationError } from '../../../shared/errors/index.js';
import { readJson } from '../../../shared/utils/request-body.js';

const AddAppSchema = Type.Object({ app: Type.String() });

const ChangePasswordSchema = Type.Object({
  current_password: Type.Optional(Type.String()),
  new_password: Type.String(),
});

function validateBody<T extends TSchema>(schema: T, body: unknown): Static<T> {
  if (!Value.Check(schema, body)) {
    const first = Value.Errors(schema, body).First();
    const field = first?.path.replace(/^\//, '') || 'body';
    throw new ValidationError(`${field}: ${first?.message ?? 'invalid request body'}`);
  }
  return body;
}

export function createPolicyRoutes(policyService: PolicyService): Hono {
  const app = new Hono();

  // GET /policy
  app.get('/', (c) => c.json(policyService.getConfig()));

  // POST /policy/reload - re-read the config file
  app.post('/reload', async (c) => {
    const result = await policyService.reload();
    if (!result.ok) {
      return c.json(
        { reloaded: false, error: result.error, code: 'CONFIG_ERROR', locked_apps: [...result.policy.keywords] },
        500
      );
    }
    return c.json({ reloaded: true, locked_apps: [...result.policy.keywords] });
  });

  // PATCH /policy - grace period, attempts, timeout, relock, polling interval
  app.patch('/', async (c) => {
    return c.json(await policyService.updateSettings(await readJson(c)));
  });

  // POST /policy/apps - lock another app
  app.post('/apps', async (c) => {
    const { app: keyword } = validateBody(AddAppSchema, await readJson(c));
    return c.json(await policyService.addApp(keyword), 201);
  });

  // DELETE /policy/apps/:keyword
  app.delete('/apps/:keyword', async (c) => {
    return c.json(await policyService.removeApp(c.req.param('keyword')));
  });

  // POST /policy/password - set or change the unlock password
  app.post('/password', async (c) => {
    const body = validateBody(ChangePasswordSchema, await readJson(c));
    await policyService.changePassword(body.current_password, body.new_password);
    return c.json({ password_set: true });
  });

  return app;
}
