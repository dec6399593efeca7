export type StoreMode = 'enabled' | 'degraded';

export type SystemMetricSample = {
  time: Date;
  cpuPercent: number;
  memUsed: number;
  memTotal: number;
  diskUsed: number;
  diskTotal: number;
  loadAvg: number;
};

export type ApiMetricSample = {
  time: Date;
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  ipAddress: string;
};

export type ApiMetricInput = Omit<ApiMetricSample, 'time'>;

export type ApiSummary = {
  totalRequests: number;
  successRequests: number;
  avgDurationMs: number;
  p95DurationMs: number;
  errorRate: number;
};

export type TimePoint = {
  time: Date;
  value: number;
};

export type EndpointStat = {
  path: string;
  totalRequests: number;
  avgDurationMs: number;
  p95DurationMs: number;
  maxDurationMs: number;
  errorCount: number;
};

export type ApiLogQuery = {
  windowMs: number;
  errorsOnly?: boolean;
  limit?: number;
  offset?: number;
};

/** node-postgres query config; `query_timeout` rejects the call client-side. */
export type MetricsQuery = {
  text: string;
  values?: unknown[];
  query_timeout?: number;
};

/**
 * Anything that can run a parameterised statement. A node-postgres `Pool`
 * satisfies it, as do the in-process stand-ins used by the tests.
 */
export interface MetricsExecutor {
  query(query: string | MetricsQuery, values?: unknown[]): Promise<{ rows: unknown[] }>;
}
