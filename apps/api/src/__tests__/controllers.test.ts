/**
 * HTTP surface: routing, validation, error mapping and the access gate,
 * exercised through supertest against the in-memory store.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import { DeterministicClock, InMemoryTimeSeriesStore } from '@sensorgrid/adapters';
import {
  QueryTimeoutError,
  StoreUnavailableError,
  type AccessGatePort,
  type SeriesOptions,
  type SeriesPage,
  type SeriesResult,
  type SeriesSelector,
  type TelemetryQueryPort,
  type TimeWindow,
} from '@sensorgrid/domain';
import { buildApp } from '../app.js';
import { IngestionRouter } from '../services/ingestion/ingestion-router.js';
import { QueryEngine } from '../services/query/query-engine.js';

const NOW_MS = Date.UTC(2024, 0, 1);
const FROM = '2024-01-01T00:00:00Z';
const TO = '2024-01-01T00:01:00Z';

class FakeQueryEngine implements TelemetryQueryPort {
  readonly series = jest.fn<
    (selector: SeriesSelector, window: TimeWindow, options?: SeriesOptions) => Promise<SeriesResult>
  >(async () => ({ readings: [], expired: 0 }));

  async *pages(): AsyncGenerator<SeriesPage> {}
}

describe('HTTP API', () => {
  let store: InMemoryTimeSeriesStore;
  let ingestion: IngestionRouter;
  let queryEngine: QueryEngine;

  beforeEach(() => {
    store = new InMemoryTimeSeriesStore();
    ingestion = new IngestionRouter({
      store,
      retentionSeconds: 3_600,
      clock: new DeterministicClock(NOW_MS, 0),
    });
    queryEngine = new QueryEngine({ store, clock: new DeterministicClock(NOW_MS, 0) });
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function app(overrides: { queryEngine?: TelemetryQueryPort; accessGate?: AccessGatePort } = {}) {
    return buildApp({ queryEngine, ingestion, storeDriver: 'memory', httpLog: false, ...overrides });
  }

  it('GET /healthz should report the store driver', async () => {
    const res = await request(app()).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', store: 'memory' });
  });

  it('should serve an ingested reading by sensor type and by device', async () => {
    const posted = await request(app())
      .post('/api/ingest/messages')
      .send({
        topic: 'hvac/unit_1_hvac',
        payload: {
          device_id: 'unit_1_hvac',
          sensor_type: 'hvac',
          timestamp: '2023-12-31T23:59:59Z',
          values: { hvac_power_kw: 3.5 },
          schema_version: 1,
        },
      });
    expect(posted.status).toBe(202);
    expect(posted.body).toEqual({ outcome: 'stored' });

    const reading = {
      deviceId: 'unit_1_hvac',
      sensorType: 'hvac',
      timestamp: FROM,
      values: { hvac_power_kw: 3.5 },
      schemaVersion: 1,
    };
    const bySensor = await request(app()).get('/api/series').query({ sensorType: 'hvac', from: FROM, to: TO });
    expect(bySensor.status).toBe(200);
    expect(bySensor.body).toEqual({ data: [reading], count: 1, expired: 0, window: { from: FROM, to: TO } });

    const byDevice = await request(app()).get('/api/devices/unit_1_hvac/series').query({ from: FROM, to: TO });
    expect(byDevice.body.data).toEqual([reading]);
  });

  it('POST /api/ingest/messages should report diverted messages', async () => {
    const res = await request(app()).post('/api/ingest/messages').send({ topic: 'hvac/unit_1_hvac', payload: '{' });
    expect(res.status).toBe(202);
    expect(res.body).toEqual({ outcome: 'diverted' });
    expect(store.errorRecords()).toHaveLength(1);
  });

  it('POST /api/ingest/messages should reject a body without a topic', async () => {
    const res = await request(app()).post('/api/ingest/messages').send({ payload: '{}' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('GET /api/series should validate its query', async () => {
    const res = await request(app()).get('/api/series').query({ sensorType: 'hvac', to: TO });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('GET /api/series should reject a reversed window', async () => {
    const res = await request(app()).get('/api/series').query({ sensorType: 'hvac', from: TO, to: FROM });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'invalid_window', message: 'from must not be after to' });
  });

  it('GET /api/devices/:deviceId/series should reject device ids outside the topic grammar', async () => {
    const res = await request(app()).get('/api/devices/unit%201/series').query({ from: FROM, to: TO });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('should forward the per-request timeout to the query engine', async () => {
    const fake = new FakeQueryEngine();
    await request(app({ queryEngine: fake }))
      .get('/api/series')
      .query({ sensorType: 'panel', from: FROM, to: TO, timeoutMs: '500' });
    expect(fake.series).toHaveBeenCalledWith({ sensorType: 'panel' }, { from: FROM, to: TO }, { timeoutMs: 500 });
  });

  it('should map store and timeout failures to 503 and 504', async () => {
    const fake = new FakeQueryEngine();
    fake.series
      .mockRejectedValueOnce(new StoreUnavailableError('store down'))
      .mockRejectedValueOnce(new QueryTimeoutError('query exceeded 500ms'));
    const server = app({ queryEngine: fake });

    const unavailable = await request(server).get('/api/series').query({ sensorType: 'hvac', from: FROM, to: TO });
    expect(unavailable.status).toBe(503);
    expect(unavailable.body).toEqual({ error: 'store_unavailable', message: 'store down' });

    const timedOut = await request(server).get('/api/series').query({ sensorType: 'hvac', from: FROM, to: TO });
    expect(timedOut.status).toBe(504);
    expect(timedOut.body).toEqual({ error: 'query_timeout', message: 'query exceeded 500ms' });
  });

  it('should hide unexpected failures behind a 500', async () => {
    const fake = new FakeQueryEngine();
    fake.series.mockRejectedValueOnce(new Error('boom'));
    const res = await request(app({ queryEngine: fake })).get('/api/series').query({
      sensorType: 'hvac',
      from: FROM,
      to: TO,
    });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'internal_error' });
  });

  describe('with an access gate', () => {
    const accessGate: AccessGatePort = {
      authenticate: async (username, password) => username === 'operator' && password === 'test-secret',
    };

    it('should require credentials under /api only', async () => {
      const server = app({ accessGate });

      expect((await request(server).get('/healthz')).status).toBe(200);

      const denied = await request(server).get('/api/series').query({ sensorType: 'hvac', from: FROM, to: TO });
      expect(denied.status).toBe(401);
      expect(denied.body).toEqual({ error: 'unauthorized' });

      const allowed = await request(server)
        .get('/api/series')
        .auth('operator', 'test-secret')
        .query({ sensorType: 'hvac', from: FROM, to: TO });
      expect(allowed.status).toBe(200);
      expect(allowed.body.count).toBe(0);
    });

    it('should guard ingestion too', async () => {
      const res = await request(app({ accessGate }))
        .post('/api/ingest/messages')
        .auth('operator', 'wrong')
        .send({ topic: 'hvac/unit_1_hvac', payload: '{}' });
      expect(res.status).toBe(401);
      expect(store.size).toBe(0);
    });
  });
});
