import { FastifyInstance } from 'fastify';
import { buildServer } from '@api/http';
import { MetricsStore, MonitoringAnalytics } from '@monitoring/index';
import { MockMetricsPool } from '../utils/mockMetricsPool';

const BASE = Date.UTC(2026, 0, 15, 10, 0, 0);

const setup = async (monitoringToken?: string) => {
  const pool = new MockMetricsPool({ timescale: false });
  const store = await MetricsStore.open(pool, { now: () => BASE });
  const app = buildServer({
    store,
    analytics: new MonitoringAnalytics(store),
    monitoringToken,
    instrumentation: { excludePaths: ['/monitoring/'] },
    logger: false,
  });
  return { pool, store, app };
};

describe('HTTP API', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('reports health with the metrics mode', async () => {
    const ctx = await setup();
    app = ctx.app;
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', metricsMode: 'degraded' });
  });

  it('records its own requests through the instrumentation hook', async () => {
    const ctx = await setup();
    app = ctx.app;
    await app.inject({ method: 'GET', url: '/health?verbose=1' });
    await new Promise((resolve) => setImmediate(resolve));
    await ctx.store.flush();
    expect(ctx.pool.apiRows.map((row) => [row.method, row.path, row.status_code])).toEqual([
      ['GET', '/health', 200],
    ]);
  });

  it('serves the API summary', async () => {
    const ctx = await setup();
    app = ctx.app;
    ctx.store.recordApiMetric({ method: 'GET', path: '/api/entries', statusCode: 200, durationMs: 20, ipAddress: '10.0.0.1' });
    ctx.store.recordApiMetric({ method: 'GET', path: '/api/entries', statusCode: 500, durationMs: 40, ipAddress: '10.0.0.1' });
    await ctx.store.flush();

    const response = await app.inject({ method: 'GET', url: '/monitoring/summary?range=1h' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      totalRequests: 2,
      successRequests: 1,
      avgDurationMs: 30,
      p95DurationMs: 39,
      errorRate: 0.5,
    });
  });

  it('serves resource trends and rejects unknown resources', async () => {
    const ctx = await setup();
    app = ctx.app;
    await ctx.store.recordSystemMetrics({
      time: new Date(BASE - 30_000),
      cpuPercent: 42.5,
      memUsed: 4,
      memTotal: 8,
      diskUsed: 1,
      diskTotal: 5,
      loadAvg: 0.1,
    });

    const cpu = await app.inject({ method: 'GET', url: '/monitoring/trends/cpu?range=5m' });
    expect(cpu.statusCode).toBe(200);
    expect(cpu.json()).toEqual({
      resource: 'cpu',
      points: [{ time: '2026-01-15T09:59:00.000Z', value: 42.5 }],
    });

    const unknown = await app.inject({ method: 'GET', url: '/monitoring/trends/gpu' });
    expect(unknown.statusCode).toBe(404);
  });

  it('serves endpoint rankings and paginated logs', async () => {
    const ctx = await setup();
    app = ctx.app;
    ctx.store.recordApiMetric({ method: 'GET', path: '/api/rooms', statusCode: 200, durationMs: 5, ipAddress: '10.0.0.1' });
    ctx.store.recordApiMetric({ method: 'GET', path: '/api/rooms', statusCode: 200, durationMs: 7, ipAddress: '10.0.0.1' });
    ctx.store.recordApiMetric({ method: 'POST', path: '/api/invoices', statusCode: 422, durationMs: 90, ipAddress: '10.0.0.9' });
    await ctx.store.flush();

    const top = await app.inject({ method: 'GET', url: '/monitoring/endpoints/top?limit=1' });
    expect(top.json().endpoints).toEqual([
      {
        path: '/api/rooms',
        totalRequests: 2,
        avgDurationMs: 6,
        p95DurationMs: 6.9,
        maxDurationMs: 7,
        errorCount: 0,
      },
    ]);

    const slowest = await app.inject({ method: 'GET', url: '/monitoring/endpoints/slowest' });
    expect(slowest.json().endpoints.map((stat: { path: string }) => stat.path)).toEqual([
      '/api/invoices',
      '/api/rooms',
    ]);

    const logs = await app.inject({ method: 'GET', url: '/monitoring/logs?errorsOnly=true' });
    expect(logs.statusCode).toBe(200);
    expect(logs.json()).toEqual({
      logs: [
        {
          time: '2026-01-15T10:00:00.000Z',
          method: 'POST',
          path: '/api/invoices',
          statusCode: 422,
          durationMs: 90,
          ipAddress: '10.0.0.9',
        },
      ],
      limit: 100,
      offset: 0,
    });
  });

  it('rejects invalid query strings with 400', async () => {
    const ctx = await setup();
    app = ctx.app;
    const response = await app.inject({ method: 'GET', url: '/monitoring/logs?limit=0' });
    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('Invalid request');
  });

  it('surfaces read failures as 500', async () => {
    const ctx = await setup();
    app = ctx.app;
    ctx.pool.fail(/count\(\*\) as total/, new Error('canceling statement due to statement timeout'));
    const response = await app.inject({ method: 'GET', url: '/monitoring/summary' });
    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'canceling statement due to statement timeout' });
  });

  it('guards monitoring routes when a token is configured', async () => {
    const ctx = await setup('test-token');
    app = ctx.app;

    const denied = await app.inject({ method: 'GET', url: '/monitoring/summary' });
    expect(denied.statusCode).toBe(401);

    const allowed = await app.inject({
      method: 'GET',
      url: '/monitoring/summary',
      headers: { 'x-monitoring-token': 'test-token' },
    });
    expect(allowed.statusCode).toBe(200);

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);

    const counters = await app.inject({ method: 'GET', url: '/metrics' });
    expect(counters.statusCode).toBe(200);
  });

  it('serves the in-process counters', async () => {
    const ctx = await setup();
    app = ctx.app;
    await ctx.store.recordSystemMetrics({
      time: new Date(BASE),
      cpuPercent: 10,
      memUsed: 1,
      memTotal: 2,
      diskUsed: 1,
      diskTotal: 2,
      loadAvg: 0,
    });

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.json()['monitoring.system_metrics.written']).toBeGreaterThanOrEqual(1);
  });
});
