import request from 'supertest';
import { TestApp, buildTestApp } from './testApp';

const signIn = async (ctx: TestApp, username: string, password = 'test-secret') => {
  const agent = request.agent(ctx.app);
  await agent.post('/auth/login').send({ username, password }).expect(303);
  return agent;
};

describe('Monthly Hours Settings Integration Tests', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  describe('GET /api/settings/monthly-hours', () => {
    test('should fill unsaved months with the default limit over the calendar month', async () => {
      const agent = await signIn(ctx, 'pdl');

      const response = await agent.get('/api/settings/monthly-hours?year=2024').expect(200);

      expect(response.body.year).toBe(2024);
      expect(response.body.months).toHaveLength(12);
      expect(response.body.months[1]).toEqual({
        month: 2,
        maxHours: 183.75,
        startDate: '2024-02-01',
        endDate: '2024-02-29'
      });
    });

    test('should refuse team leads', async () => {
      const agent = await signIn(ctx, 'tlead');

      const response = await agent.get('/api/settings/monthly-hours').expect(403);

      expect(response.body.error.code).toBe('FORBIDDEN');
    });
  });

  describe('PUT /api/settings/monthly-hours', () => {
    test('should store a month and return the whole year', async () => {
      const agent = await signIn(ctx, 'admin', 'admin');

      const response = await agent
        .put('/api/settings/monthly-hours')
        .send({ year: 2024, months: [{ month: 3, maxHours: 168, startDate: '2024-02-26', endDate: '2024-03-25' }] })
        .expect(200);

      expect(response.body.months[2]).toEqual({
        month: 3,
        maxHours: 168,
        startDate: '2024-02-26',
        endDate: '2024-03-25'
      });
      expect(response.body.months[3].maxHours).toBe(183.75);
      expect(ctx.monthlyHours.rows.get('2024-3')).toEqual({
        month: 3,
        maxHours: 168,
        startDate: '2024-02-26',
        endDate: '2024-03-25'
      });
    });

    test('should reject a limit that is not positive', async () => {
      const agent = await signIn(ctx, 'pdl');

      const response = await agent
        .put('/api/settings/monthly-hours')
        .send({ year: 2024, months: [{ month: 3, maxHours: 0 }] })
        .expect(400);

      expect(response.body.error.code).toBe('VALIDATION_ERROR');
      expect(response.body.error.details[0].field).toBe('months.0.maxHours');
      expect(ctx.monthlyHours.rows.size).toBe(0);
    });

    test('should reject a period that ends before it starts', async () => {
      const agent = await signIn(ctx, 'pdl');

      const response = await agent
        .put('/api/settings/monthly-hours')
        .send({ year: 2024, months: [{ month: 3, maxHours: 160, startDate: '2024-03-25', endDate: '2024-03-01' }] })
        .expect(400);

      expect(response.body.error.details).toEqual([
        { field: 'months.0.endDate', message: '"endDate" must not be before "startDate"' }
      ]);
      expect(ctx.monthlyHours.rows.size).toBe(0);
    });

    test('should reject the same month twice', async () => {
      const agent = await signIn(ctx, 'pdl');

      await agent
        .put('/api/settings/monthly-hours')
        .send({ year: 2024, months: [{ month: 3, maxHours: 160 }, { month: 3, maxHours: 150 }] })
        .expect(400);
    });

    test('should require a session', async () => {
      const response = await request(ctx.app)
        .put('/api/settings/monthly-hours')
        .send({ year: 2024, months: [{ month: 3, maxHours: 160 }] })
        .expect(401);

      expect(response.body.error.code).toBe('NOT_AUTHENTICATED');
    });
  });
});
