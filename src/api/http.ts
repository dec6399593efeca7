import Fastify, { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { z, ZodError } from 'zod';
import { logger, metrics } from '@telemetry/index';
import {
  InstrumentationOptions,
  MetricsStore,
  MonitoringAnalytics,
  TREND_RESOURCES,
  instrumentRequests,
} from '@monitoring/index';

export type ApiDeps = {
  store: MetricsStore;
  analytics: MonitoringAnalytics;
  instrumentation?: InstrumentationOptions;
  /** When set, `/monitoring/*` requires the `x-monitoring-token` header; `/health` and `/metrics` stay open. */
  monitoringToken?: string;
  logger?: FastifyBaseLogger | boolean;
};

const rangeQuerySchema = z.object({
  range: z.string().max(16).optional(),
});

const endpointQuerySchema = rangeQuerySchema.extend({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

const logsQuerySchema = rangeQuerySchema.extend({
  errorsOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const trendParamsSchema = z.object({
  resource: z.enum(TREND_RESOURCES),
});

const monitoringHeaderName = 'x-monitoring-token';

export const buildServer = ({
  store,
  analytics,
  instrumentation,
  monitoringToken,
  logger: serverLogger = logger as unknown as FastifyBaseLogger,
}: ApiDeps): FastifyInstance => {
  const app = Fastify({ logger: serverLogger });

  app.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Monitoring-Token'],
  });

  // Added before any route so every request, including 404s, is recorded.
  instrumentRequests(app, store, instrumentation);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'Invalid request', issues: error.issues });
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Monitoring request failed');
    }
    return reply.code(statusCode).send({ error: error.message });
  });

  const requireMonitoringToken = async (request: FastifyRequest, reply: FastifyReply) => {
    if (!monitoringToken) return;
    const header = request.headers[monitoringHeaderName];
    if (header !== monitoringToken) {
      return reply.code(401).send({ error: `Missing or invalid ${monitoringHeaderName} header.` });
    }
  };

  app.get('/health', async () => ({
    status: 'ok',
    metricsMode: store.mode,
    pendingApiWrites: store.pendingApiWrites,
  }));

  app.get('/metrics', async () => metrics.snapshot());

  app.get('/monitoring/overview', { preHandler: requireMonitoringToken }, async (request) => {
    const query = rangeQuerySchema.parse(request.query ?? {});
    return analytics.overview(query.range);
  });

  app.get('/monitoring/summary', { preHandler: requireMonitoringToken }, async (request) => {
    const query = rangeQuerySchema.parse(request.query ?? {});
    return analytics.getApiSummary(query.range);
  });

  app.get('/monitoring/trends/:resource', { preHandler: requireMonitoringToken }, async (request, reply) => {
    const params = trendParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(404).send({ error: 'Unknown resource' });
    }
    const query = rangeQuerySchema.parse(request.query ?? {});
    const points = await analytics.getTrend(params.data.resource, query.range);
    return { resource: params.data.resource, points };
  });

  app.get('/monitoring/endpoints/top', { preHandler: requireMonitoringToken }, async (request) => {
    const query = endpointQuerySchema.parse(request.query ?? {});
    return { endpoints: await analytics.getTopEndpoints(query.range, query.limit) };
  });

  app.get('/monitoring/endpoints/slowest', { preHandler: requireMonitoringToken }, async (request) => {
    const query = endpointQuerySchema.parse(request.query ?? {});
    return { endpoints: await analytics.getSlowestEndpoints(query.range, query.limit) };
  });

  app.get('/monitoring/logs', { preHandler: requireMonitoringToken }, async (request) => {
    const query = logsQuerySchema.parse(request.query ?? {});
    const logs = await analytics.getApiLogs(query.range, {
      errorsOnly: query.errorsOnly,
      limit: query.limit,
      offset: query.offset,
    });
    return { logs, limit: query.limit, offset: query.offset };
  });

  return app;
};
