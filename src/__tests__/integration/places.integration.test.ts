/**
 * Integration Tests — Places & Runs Endpoints
 *
 *   GET  /api/v1/places?limit=...   — ranked JSON view
 *   GET  /api/v1/places/export.csv  — ranked CSV
 *   GET  /api/v1/places/:id         — single lookup
 *   POST /api/v1/runs               — pipeline trigger
 *
 * Real container, real repository, in-memory SQLite; only the Places API,
 * the classifier and the homepage fetcher are jest mocks.
 */
import { CLOSED_PERMANENTLY, MAX_RUN_QUERIES } from '@shared/constants';
import request from 'supertest';

import { sampleClassification, samplePlaceDetails } from '../helpers/fixtures';
import { createTestApp, TestApp } from '../helpers/testApp';

describe('Places API', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.destroy();
  });

  async function seed(): Promise<void> {
    await t.repo.upsert('low', { name: 'Low Score Ltd' });
    await t.repo.writeScore('low', 20);
    await t.repo.upsert('high', { name: 'High Score Ltd', phone: '555' });
    await t.repo.writeScore('high', 90);
    await t.repo.upsert('closed', { name: 'Closed Ltd', businessStatus: CLOSED_PERMANENTLY });
    await t.repo.writeScore('closed', 99);
  }

  describe('GET /api/v1/places', () => {
    it('should list open places ranked by score with the default limit', async () => {
      await seed();

      const res = await request(t.app).get('/api/v1/places');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('success');
      expect(res.body.data.map((p: { id: string }) => p.id)).toEqual(['high', 'low']);
      expect(res.body.meta).toMatchObject({ count: 2, limit: 50 });
    });

    it('should honour the limit', async () => {
      await seed();

      const res = await request(t.app).get('/api/v1/places?limit=1');

      expect(res.status).toBe(200);
      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0].id).toBe('high');
    });

    it.each(['0', '501', 'abc'])('should reject limit=%s with 400', async (limit) => {
      const res = await request(t.app).get(`/api/v1/places?limit=${limit}`);

      expect(res.status).toBe(400);
      expect(res.body.status).toBe('error');
      expect(res.body.message).toMatch(/^limit: /);
    });
  });

  describe('GET /api/v1/places/export.csv', () => {
    it('should download the ranked CSV', async () => {
      await seed();

      const res = await request(t.app).get('/api/v1/places/export.csv');

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe('attachment; filename="ranked.csv"');
      const lines = res.text.trimEnd().split('\n');
      expect(lines).toHaveLength(3);
      expect(lines[1].startsWith('High Score Ltd,555,')).toBe(true);
      expect(lines[2].startsWith('Low Score Ltd,')).toBe(true);
    });
  });

  describe('GET /api/v1/places/:id', () => {
    it('should return a stored place, closed ones included', async () => {
      await seed();

      const res = await request(t.app).get('/api/v1/places/closed');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({
        id: 'closed',
        name: 'Closed Ltd',
        businessStatus: CLOSED_PERMANENTLY,
        totalScore: 99,
        firstSeen: '2026-03-01T09:00:00Z',
      });
    });

    it('should return 404 for an unknown id', async () => {
      const res = await request(t.app).get('/api/v1/places/ghost');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ status: 'error', message: 'Place not found: ghost' });
    });
  });

  describe('POST /api/v1/runs', () => {
    it('should run the pipeline end to end and store a scored place', async () => {
      t.places.textSearch.mockResolvedValue([samplePlaceDetails]);
      t.places.getDetails.mockResolvedValue(samplePlaceDetails);
      t.classifier.classify.mockResolvedValue(sampleClassification);
      t.homepage.fetchText.mockResolvedValue('Emergency plumbing, 24/7');

      const res = await request(t.app)
        .post('/api/v1/runs')
        .send({ queries: ['plumber in St. John\'s NL'], classifyLimit: 5 });

      expect(res.status).toBe(200);
      expect(res.body.data.discovery).toMatchObject({
        queries: 1,
        found: 1,
        newIds: [samplePlaceDetails.id],
        seenIds: [],
      });
      expect(res.body.data.enrichment).toMatchObject({ targets: 1, enriched: 1, failed: 0 });
      expect(res.body.data.classification).toEqual({ scanned: 1, classified: 1, skipped: 0, failed: 0 });

      const place = await t.repo.findById(samplePlaceDetails.id);
      expect(place?.phone).toBe('+1 709-555-0101');
      expect(place?.classification?.industryBucket).toBe('Trades');
      // 73.5 from the fits plus four boosts
      expect(place?.totalScore).toBeCloseTo(93.5);
    });

    it('should skip the metered calls for a place already complete and classified', async () => {
      await t.repo.upsert(samplePlaceDetails.id, {
        phone: samplePlaceDetails.phone,
        mapsUrl: samplePlaceDetails.mapsUrl,
        website: samplePlaceDetails.website,
      });
      await t.repo.writeClassification(samplePlaceDetails.id, sampleClassification);
      t.places.textSearch.mockResolvedValue([samplePlaceDetails]);

      const res = await request(t.app).post('/api/v1/runs').send({ queries: ['plumber'] });

      expect(res.status).toBe(200);
      expect(res.body.data.discovery.seenIds).toEqual([samplePlaceDetails.id]);
      expect(t.places.getDetails).not.toHaveBeenCalled();
      expect(t.classifier.classify).not.toHaveBeenCalled();
      expect(res.body.data.classification).toEqual({ scanned: 1, classified: 0, skipped: 1, failed: 0 });
    });

    it('should reclassify a place whose website changed even when the limit is used up', async () => {
      const drifted = 'place-9-drift';
      const fresh = 'place-0-new';
      await t.repo.upsert(drifted, { name: 'Bay Towing', website: 'https://a.example' });
      await t.repo.writeClassification(drifted, sampleClassification);

      t.places.textSearch.mockResolvedValue([
        { ...samplePlaceDetails, id: fresh },
        { ...samplePlaceDetails, id: drifted },
      ]);
      t.places.getDetails.mockImplementation(async (id) =>
        id === drifted
          ? { ...samplePlaceDetails, id, website: 'https://b.example' }
          : { ...samplePlaceDetails, id, website: null },
      );
      t.classifier.classify.mockResolvedValue(sampleClassification);

      const res = await request(t.app).post('/api/v1/runs').send({ queries: ['towing'], classifyLimit: 1 });

      expect(res.status).toBe(200);
      expect(res.body.data.enrichment.reclassifyIds).toEqual([drifted]);
      expect(res.body.data.classification).toEqual({ scanned: 2, classified: 2, skipped: 0, failed: 0 });
      expect(t.classifier.classify).toHaveBeenCalledWith(
        expect.objectContaining({ website: 'https://b.example' }),
      );
      expect((await t.repo.findById(drifted))?.website).toBe('https://b.example');
    });

    it.each([
      ['no queries', {}],
      ['an empty query list', { queries: [] }],
      ['a blank query', { queries: ['  '] }],
      ['too many queries', { queries: Array.from({ length: MAX_RUN_QUERIES + 1 }, (_, i) => `q${i}`) }],
      ['a negative limit', { queries: ['plumber'], classifyLimit: -1 }],
    ])('should reject %s with 400', async (_label, body) => {
      const res = await request(t.app).post('/api/v1/runs').send(body);

      expect(res.status).toBe(400);
      expect(res.body.status).toBe('error');
      expect(t.places.textSearch).not.toHaveBeenCalled();
    });

    it('should reject a malformed JSON body with 400', async () => {
      const res = await request(t.app)
        .post('/api/v1/runs')
        .set('Content-Type', 'application/json')
        .send('{"queries":');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ status: 'error', message: 'Malformed JSON body' });
    });
  });
});
