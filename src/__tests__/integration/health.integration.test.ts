/**
 * Integration Tests — Health Endpoint
 *
 * GET /api/v1/health through the full middleware chain (helmet, cors,
 * compression, JSON parser, request logger) with Supertest. No port is bound.
 * Liveness only: the handler never touches the database.
 */
import request from 'supertest';

import { createTestApp, TestApp } from '../helpers/testApp';

describe('GET /api/v1/health', () => {
  let t: TestApp;

  beforeAll(async () => {
    t = await createTestApp();
  });

  afterAll(async () => {
    await t.destroy();
  });

  it('should return 200 with status "ok"', async () => {
    const res = await request(t.app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('should include an uptime value (number of seconds)', async () => {
    const res = await request(t.app).get('/api/v1/health');

    expect(typeof res.body.uptime).toBe('number');
    expect(res.body.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should include a valid ISO 8601 timestamp', async () => {
    const res = await request(t.app).get('/api/v1/health');

    const parsed = new Date(res.body.timestamp);
    expect(parsed.toISOString()).toBe(res.body.timestamp);
  });

  it('should return JSON content type', async () => {
    const res = await request(t.app).get('/api/v1/health');

    expect(res.headers['content-type']).toMatch(/application\/json/);
  });
});
