import request from 'supertest';
import { createApp } from '../index';
import { DashboardService } from '../services/dashboard.service';
import { SessionContextService } from '../services/session-context.service';
import { fixture, fixtureSources } from './helpers/tables';

describe('HTTP API', () => {
  const app = createApp(new DashboardService(fixtureSources), new SessionContextService());

  test('GET /health reports cache state', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
    expect(res.body.cache.snapshots).toHaveProperty('size');
  });

  test('GET /options lists filter choices', async () => {
    const res = await request(app).get('/options');

    expect(res.status).toBe(200);
    expect(res.body.data.types).toEqual(['Email', 'Meeting', 'Webinar']);
    expect(res.body.data.dateColumn).toBe('Activity Date');
    expect(res.body.data.dateBounds).toEqual({
      start: '2024-01-05T00:00:00.000Z',
      end: '2024-03-01T00:00:00.000Z',
    });
  });

  test('POST /activity/query filters joined rows', async () => {
    const res = await request(app).post('/activity/query').send({ types: 'Meeting', limit: 1 });

    expect(res.status).toBe(200);
    expect(res.body.data.available).toBe(true);
    expect(res.body.data.data.total).toBe(3);
    expect(res.body.data.data.rows).toHaveLength(1);
  });

  test('POST /accounts/top ranks accounts', async () => {
    const res = await request(app).post('/accounts/top').send({ limit: 1 });

    expect(res.body.data).toEqual({ available: true, data: [{ account: 'Acme Corp', activityCount: 2 }] });
  });

  test('GET /accounts/:account/timeline returns named engagements', async () => {
    const res = await request(app).get('/accounts/Acme%20Corp/timeline');

    expect(res.status).toBe(200);
    expect(res.body.data.data[0]).toMatchObject({
      timestamp: '2024-01-05T00:00:00.000Z',
      label: 'Jane Doe - Decision Maker',
    });
  });

  test('POST /accounts/:account/contacts filters by card color', async () => {
    const res = await request(app).post('/accounts/Acme%20Corp/contacts').send({ statuses: ['purple'] });

    expect(res.status).toBe(200);
    expect(res.body.data.data.total).toBe(4);
    expect(res.body.data.data.contacts).toEqual([
      {
        name: 'John Smith',
        title: 'CIO',
        affinityCode: 'X',
        isEngaged: false,
        status: 'affinity',
        color: 'purple',
        partyKey: 'CIT-1001',
        normalizedKey: '1001',
      },
    ]);
  });

  test('rejects an invalid date bound with 400', async () => {
    const res = await request(app).post('/accounts/top').send({ start: 'yesterday' });

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.message).toBe('"start" is not a valid date: yesterday');
  });

  test('rejects an unknown contact status with 400', async () => {
    const res = await request(app).post('/accounts/Acme%20Corp/contacts').send({ statuses: ['green'] });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Unknown contact status: green');
  });

  test('PUT /sessions/:sessionId renders the session view', async () => {
    const res = await request(app)
      .put('/sessions/s1')
      .send({ account: 'Globex', contacts: { statuses: ['engaged'] } });

    expect(res.status).toBe(200);
    expect(res.body.data.context.account).toBe('Globex');
    expect(res.body.data.view.contacts.data.contacts.map((card: { name: string }) => card.name)).toEqual(['Ana Lopez']);

    const stored = await request(app).get('/sessions/s1');
    expect(stored.body.data.context.contacts).toEqual({ statuses: ['engaged'] });

    const cleared = await request(app).delete('/sessions/s1');
    expect(cleared.body).toEqual({ success: true, cleared: true });
  });

  test('PUT /sessions/:sessionId rejects a non-string account', async () => {
    const res = await request(app).put('/sessions/s2').send({ account: 42 });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  test('POST /sources/reload reports row counts', async () => {
    const res = await request(app).post('/sources/reload');

    expect(res.status).toBe(200);
    expect(res.body.data).toMatchObject({ activityRows: 6, firmographicRows: 3, contactRows: 6, issues: [] });
  });

  test('answers 502 when a source cannot be loaded', async () => {
    const broken = createApp(
      new DashboardService({ ...fixtureSources, activity: fixture('does-not-exist.csv') }),
      new SessionContextService()
    );
    const res = await request(broken).get('/options');

    expect(res.status).toBe(502);
    expect(res.body.error.code).toBe('LOAD_ERROR');
  });
});
