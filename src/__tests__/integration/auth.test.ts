import request from 'supertest';
import { TestApp, buildTestApp, storedSessionCount } from './testApp';

describe('Authentication Flow Integration Tests', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  describe('POST /auth/login', () => {
    test('should sign the default superadmin in as ADMIN with no directory reachable', async () => {
      ctx = buildTestApp({ LDAP_SERVER: '' });
      const agent = request.agent(ctx.app);

      const login = await agent.post('/auth/login').send({ username: 'admin', password: 'admin' }).expect(303);
      expect(login.headers.location).toBe('/dashboard');

      const me = await agent.get('/api/me').expect(200);
      expect(me.body.role).toBe('ADMIN');
      expect(me.body.identity.username).toBe('admin');
      expect(me.body.menu.map((section: { key: string }) => section.key)).toContain('admin');
      expect(ctx.connections).toHaveLength(0);
    });

    test('should resolve a directory user titled "Team Lead" to TEAM_LEAD', async () => {
      const agent = request.agent(ctx.app);

      await agent.post('/auth/login').send({ username: 'tlead', password: 'test-secret' }).expect(303);

      const me = await agent.get('/api/me').expect(200);
      expect(me.body.role).toBe('TEAM_LEAD');
      expect(me.body.identity).toEqual({
        username: 'tlead',
        displayName: 'Terry Lead',
        title: 'Team Lead',
        distinguishedName: 'CN=Terry Lead,OU=People,DC=example,DC=com',
        email: 'tlead@example.com'
      });
      expect(me.body).not.toHaveProperty('directoryCredential');
      expect(ctx.connections.every(connection => connection.unbindCount === 1)).toBe(true);
    });

    test('should accept form-encoded logins', async () => {
      await request(ctx.app)
        .post('/auth/login')
        .type('form')
        .send({ username: 'staff', password: 'test-secret' })
        .expect(303)
        .expect('Location', '/dashboard');
    });

    test('should leave the store empty when the directory times out', async () => {
      const response = await request(ctx.app)
        .post('/auth/login')
        .send({ username: 'slow', password: 'test-secret' })
        .expect(503);

      expect(response.body.error.message).toBe('Unable to authenticate at this time.');
      expect(response.headers['set-cookie']).toBeUndefined();
      await expect(storedSessionCount(ctx.store)).resolves.toBe(0);
      expect(ctx.connections[0].unbindCount).toBe(1);
    });

    test('should reject bad credentials with a generic message', async () => {
      const response = await request(ctx.app)
        .post('/auth/login')
        .send({ username: 'tlead', password: 'wrong-secret' })
        .expect(401);

      expect(response.body.error.code).toBe('INVALID_CREDENTIALS');
      expect(response.body.error.message).toBe('Invalid username or password.');
      await expect(storedSessionCount(ctx.store)).resolves.toBe(0);
    });

    test('should reject a missing password before contacting the directory', async () => {
      const response = await request(ctx.app).post('/auth/login').send({ username: 'tlead' }).expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(ctx.connections).toHaveLength(0);
    });

    test('should return to a same-site next path', async () => {
      await request(ctx.app)
        .post('/auth/login')
        .send({ username: 'admin', password: 'admin', next: '/reports/team' })
        .expect(303)
        .expect('Location', '/reports/team');
    });

    test.each(['//evil.example/steal', 'https://evil.example/', 'reports/team'])(
      'should ignore the unsafe next target %s',
      async next => {
        await request(ctx.app)
          .post('/auth/login')
          .send({ username: 'admin', password: 'admin', next })
          .expect(303)
          .expect('Location', '/dashboard');
      }
    );

    test('should not leave a signed-in session behind when the session write fails', async () => {
      const set = jest.spyOn(ctx.store, 'set').mockImplementationOnce((_sid, _session, callback) => {
        callback?.(new Error('session store unavailable'));
      });

      const response = await request(ctx.app)
        .post('/auth/login')
        .send({ username: 'staff', password: 'test-secret' })
        .expect(500);

      expect(response.body.error.code).toBe('INTERNAL_SERVER_ERROR');
      expect(response.headers['set-cookie']).toBeUndefined();
      expect(set).toHaveBeenCalledTimes(1);
      await expect(storedSessionCount(ctx.store)).resolves.toBe(0);
    });

    test('should store exactly one session after a successful login', async () => {
      await request(ctx.app).post('/auth/login').send({ username: 'admin', password: 'admin' }).expect(303);

      await expect(storedSessionCount(ctx.store)).resolves.toBe(1);
    });
  });

  describe('GET /auth/login', () => {
    test('should describe the login view when signed out', async () => {
      const response = await request(ctx.app).get('/auth/login?next=%2Freports%2Fteam').expect(200);

      expect(response.body).toEqual({ page: 'login', authenticated: false, next: '/reports/team' });
    });

    test('should send signed-in users to the dashboard', async () => {
      const agent = request.agent(ctx.app);
      await agent.post('/auth/login').send({ username: 'admin', password: 'admin' }).expect(303);

      await agent.get('/auth/login').expect(302).expect('Location', '/dashboard');
    });
  });

  describe('GET /auth/logout', () => {
    test('should sign out from a plain link', async () => {
      const agent = request.agent(ctx.app);
      await agent.post('/auth/login').send({ username: 'staff', password: 'test-secret' }).expect(303);

      await agent.get('/auth/logout').expect(303).expect('Location', '/auth/login');

      await agent.get('/api/me').expect(401);
      await expect(storedSessionCount(ctx.store)).resolves.toBe(0);
    });
  });

  describe('POST /auth/logout', () => {
    test('should end the session so protected routes answer NOT_AUTHENTICATED', async () => {
      const agent = request.agent(ctx.app);
      await agent.post('/auth/login').send({ username: 'staff', password: 'test-secret' }).expect(303);
      await agent.get('/api/me').expect(200);

      await agent.post('/auth/logout').expect(303).expect('Location', '/auth/login');

      const me = await agent.get('/api/me').expect(401);
      expect(me.body.error.code).toBe('NOT_AUTHENTICATED');
      await expect(storedSessionCount(ctx.store)).resolves.toBe(0);
    });
  });

  describe('rate limiting', () => {
    test('should block repeated failed logins', async () => {
      ctx = buildTestApp({ LOGIN_RATE_LIMIT_MAX: '2' });

      await request(ctx.app).post('/auth/login').send({ username: 'tlead', password: 'wrong' }).expect(401);
      await request(ctx.app).post('/auth/login').send({ username: 'tlead', password: 'wrong' }).expect(401);

      const blocked = await request(ctx.app)
        .post('/auth/login')
        .send({ username: 'tlead', password: 'test-secret' })
        .expect(429);

      expect(blocked.body.error.code).toBe('RATE_LIMIT_EXCEEDED');
    });
  });
});
