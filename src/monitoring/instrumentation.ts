import { FastifyInstance } from 'fastify';
import { MetricsStore } from './store';

export type InstrumentationOptions = {
  /**
   * Path prefixes that are not recorded, matched on segment boundaries
   * (`/api` covers `/api` and `/api/x`, not `/apiary`). Empty by default.
   */
  excludePaths?: string[];
};

export const requestPath = (url: string) => {
  const queryStart = url.indexOf('?');
  return queryStart === -1 ? url : url.slice(0, queryStart);
};

export const isUnderPath = (path: string, prefix: string) => {
  const base = prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;
  return path === base || path.startsWith(`${base}/`);
};

/**
 * Records one API metric per completed request. The hook runs after the
 * response has been sent and only enqueues the sample, so it never changes
 * the status, body or latency seen by the client.
 *
 * Registered on the instance passed in (not as an encapsulated plugin) so it
 * sees every route, including those added by later `register` calls.
 */
export const instrumentRequests = (
  app: FastifyInstance,
  store: Pick<MetricsStore, 'recordApiMetric'>,
  options: InstrumentationOptions = {},
) => {
  const excluded = options.excludePaths ?? [];
  app.addHook('onResponse', async (request, reply) => {
    const path = requestPath(request.url);
    if (excluded.some((prefix) => isUnderPath(path, prefix))) return;
    store.recordApiMetric({
      method: request.method,
      path,
      statusCode: reply.statusCode,
      durationMs: reply.elapsedTime,
      ipAddress: request.ip,
    });
  });
};
