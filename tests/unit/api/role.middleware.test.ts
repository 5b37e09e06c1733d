/**
 * Role Middleware Unit Tests
 */

import { Hono } from 'hono';
import { describe, it, expect } from 'vitest';

import { createRoleMiddleware } from '@/api/middleware/role.js';
import type { Principal } from '@/types/index.js';

import { clientUser, operationUser } from '../../fixtures/index.js';
import type { ErrorResponse } from '../../helpers/http.js';
import { readJson } from '../../helpers/http.js';
import { withPrincipal } from '../../mocks/index.js';

function appFor(principal: Principal | null): Hono {
  const app = new Hono();
  app.use('*', withPrincipal(principal));
  app.use('*', createRoleMiddleware('operation'));
  app.get('/test', (c) => c.json({ ok: true }));
  return app;
}

describe('Role Middleware', () => {
  it('should let a matching role through', async () => {
    const res = await appFor(operationUser).request('/test');

    expect(res.status).toBe(200);
  });

  it('should return 403 for another role', async () => {
    const res = await appFor(clientUser).request('/test');

    expect(res.status).toBe(403);
    const body = await readJson<ErrorResponse>(res);
    expect(body.error).toEqual({
      code: 'PERMISSION_DENIED',
      message: 'Requires role: operation',
      requestId: 'req-test',
    });
  });

  it('should return 401 without a principal', async () => {
    const res = await appFor(null).request('/test');

    expect(res.status).toBe(401);
  });
});
