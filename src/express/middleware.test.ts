import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import { requireRole } from './middleware.js';
import type { RoleSource } from './middleware.js';
import type { DefaultRole } from '../core/roles.js';

function createRoleSource(loggedIn: boolean, role: DefaultRole): RoleSource<DefaultRole> {
  return {
    loggedIn,
    hasAnyRole: (roles: Iterable<DefaultRole>) => [...roles].includes(role),
  };
}

function createApp(session: RoleSource<DefaultRole>, handler = vi.fn()): express.Express {
  const app = express();
  app.get('/admin', requireRole(session, ['admin']), (_req, res) => {
    handler();
    res.json({ ok: true });
  });
  return app;
}

describe('requireRole', () => {
  it('should return 401 when the session is logged out', async () => {
    const handler = vi.fn();
    const app = createApp(createRoleSource(false, 'guest'), handler);

    const response = await request(app).get('/admin');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'unauthorized', message: 'Not logged in' });
    expect(handler).not.toHaveBeenCalled();
  });

  it('should return 403 when the current role is not allowed', async () => {
    const handler = vi.fn();
    const app = createApp(createRoleSource(true, 'user'), handler);

    const response = await request(app).get('/admin');

    expect(response.status).toBe(403);
    expect(response.body).toEqual({
      error: 'forbidden',
      message: 'Current role is not allowed to access this resource',
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('should call the next handler when the role is allowed', async () => {
    const handler = vi.fn();
    const app = createApp(createRoleSource(true, 'admin'), handler);

    const response = await request(app).get('/admin');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ok: true });
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should read the session on every request', async () => {
    const session = { loggedIn: false, hasAnyRole: () => true };
    const app = createApp(session);

    expect((await request(app).get('/admin')).status).toBe(401);
    session.loggedIn = true;
    expect((await request(app).get('/admin')).status).toBe(200);
  });
});
