import { z } from 'zod';
import { logger as rootLogger, metrics, Logger } from '@telemetry/index';
import { WriteQueue } from './queue';
import {
  ApiLogQuery,
  ApiMetricInput,
  ApiMetricSample,
  ApiSummary,
  EndpointStat,
  MetricsExecutor,
  MetricsQuery,
  StoreMode,
  SystemMetricSample,
  TimePoint,
} from './types';

export class MetricsTimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'MetricsTimeoutError';
  }
}

export const withTimeout = <T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new MetricsTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
};

const SYSTEM_TABLE = `
  CREATE TABLE IF NOT EXISTS metrics_system (
    time        TIMESTAMPTZ NOT NULL,
    cpu_percent DOUBLE PRECISION NOT NULL DEFAULT 0,
    mem_used    BIGINT NOT NULL DEFAULT 0,
    mem_total   BIGINT NOT NULL DEFAULT 0,
    disk_used   BIGINT NOT NULL DEFAULT 0,
    disk_total  BIGINT NOT NULL DEFAULT 0,
    load_avg    DOUBLE PRECISION
  )
`;

const API_TABLE = `
  CREATE TABLE IF NOT EXISTS metrics_api (
    time        TIMESTAMPTZ NOT NULL,
    method      TEXT NOT NULL,
    path        TEXT NOT NULL,
    status_code INTEGER NOT NULL,
    duration_ms DOUBLE PRECISION NOT NULL,
    ip_address  TEXT
  )
`;

const METRIC_TABLES = ['metrics_system', 'metrics_api'] as const;

const INSERT_SYSTEM = `
  INSERT INTO metrics_system (time, cpu_percent, mem_used, mem_total, disk_used, disk_total, load_avg)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
`;

const INSERT_API = `
  INSERT INTO metrics_api (time, method, path, status_code, duration_ms, ip_address)
  VALUES ($1, $2, $3, $4, $5, $6)
`;

const SELECT_SUMMARY = `
  SELECT
    COUNT(*) AS total,
    COUNT(*) FILTER (WHERE status_code < 500) AS success,
    COALESCE(AVG(duration_ms), 0) AS avg_duration,
    COALESCE(percentile_cont(0.95) WITHIN GROUP (ORDER BY duration_ms), 0) AS p95_duration,
    COALESCE(COUNT(*) FILTER (WHERE status_code >= 500)::float / NULLIF(COUNT(*), 0), 0) AS error_rate
  FROM metrics_api
  WHERE time > $1
`;

const SELECT_LOGS = `
  SELECT time, method, path, status_code, duration_ms, ip_address
  FROM metrics_api
  WHERE time > $1 AND ($2::boolean = FALSE OR status_code >= 400)
  ORDER BY time DESC
  LIMIT $3 OFFSET $4
`;

const ENDPOINT_STATS = `
  SELECT path,
    COUNT(*) AS total,
    AVG(duration_ms) AS avg_duration,
    COALESCE(percentile_cont(0.95) WITHIN GROUP (ORDER BY duration_ms), 0) AS p95_duration,
    MAX(duration_ms) AS max_duration,
    COUNT(*) FILTER (WHERE status_code >= 400) AS errors
  FROM metrics_api
  WHERE time > $1
  GROUP BY path
`;

const SELECT_TOP_ENDPOINTS = `${ENDPOINT_STATS} ORDER BY total DESC, path LIMIT $2`;
const SELECT_SLOWEST_ENDPOINTS = `${ENDPOINT_STATS} ORDER BY avg_duration DESC, path LIMIT $2`;

// Both expressions align buckets on the same origin, so trends match across modes.
const BUCKET_EXPRESSIONS: Record<StoreMode, string> = {
  enabled: 'time_bucket($2::interval, time)',
  degraded: `date_bin($2::interval, time, TIMESTAMPTZ '2000-01-03 00:00:00+00')`,
};

export const TREND_RESOURCES = ['cpu', 'memory', 'disk'] as const;

export type TrendResource = (typeof TREND_RESOURCES)[number];

const TREND_VALUES: Record<TrendResource, string> = {
  cpu: 'AVG(cpu_percent)',
  memory: 'AVG(mem_used::float / NULLIF(mem_total, 0) * 100)',
  disk: 'AVG(disk_used::float / NULLIF(disk_total, 0) * 100)',
};

const buildTrendQuery = (mode: StoreMode, resource: TrendResource) => `
  SELECT ${BUCKET_EXPRESSIONS[mode]} AS bucket, ${TREND_VALUES[resource]} AS value
  FROM metrics_system
  WHERE time > $1
  GROUP BY bucket
  ORDER BY bucket
`;

const summaryRow = z.object({
  total: z.coerce.number(),
  success: z.coerce.number(),
  avg_duration: z.coerce.number(),
  p95_duration: z.coerce.number(),
  error_rate: z.coerce.number(),
});

const trendRow = z.object({
  bucket: z.coerce.date(),
  value: z.coerce.number().nullable(),
});

const logRow = z.object({
  time: z.coerce.date(),
  method: z.string(),
  path: z.string(),
  status_code: z.coerce.number(),
  duration_ms: z.coerce.number(),
  ip_address: z.string().nullable(),
});

const endpointRow = z.object({
  path: z.string(),
  total: z.coerce.number(),
  avg_duration: z.coerce.number(),
  p95_duration: z.coerce.number(),
  max_duration: z.coerce.number(),
  errors: z.coerce.number(),
});

export type MetricsSchemaOptions = {
  retentionDays?: number;
  compressAfterDays?: number;
  logger?: Logger;
};

const bestEffort = async (log: Logger, label: string, work: () => Promise<unknown>) => {
  try {
    await work();
    return true;
  } catch (err) {
    log.warn({ err }, `[monitoring] ${label} failed; continuing`);
    return false;
  }
};

/**
 * Creates the sample tables and decides the store mode. Safe to call on an
 * already initialised database: every statement is idempotent.
 */
export const initMetricsSchema = async (
  executor: MetricsExecutor,
  options: MetricsSchemaOptions = {},
): Promise<StoreMode> => {
  const log = options.logger ?? rootLogger;
  let available = false;
  try {
    const { rows } = await executor.query(
      `SELECT default_version FROM pg_available_extensions WHERE name = 'timescaledb'`,
    );
    available = rows.length > 0;
  } catch (err) {
    log.warn({ err }, '[monitoring] Could not probe for timescaledb');
  }

  let mode: StoreMode = 'degraded';
  if (available) {
    await bestEffort(log, 'CREATE EXTENSION timescaledb', () =>
      executor.query(`CREATE EXTENSION IF NOT EXISTS timescaledb CASCADE`),
    );
    try {
      const { rows } = await executor.query(
        `SELECT extversion FROM pg_extension WHERE extname = 'timescaledb'`,
      );
      if (rows.length > 0) mode = 'enabled';
    } catch (err) {
      log.warn({ err }, '[monitoring] Could not confirm timescaledb activation');
    }
  }

  await executor.query(SYSTEM_TABLE);
  await executor.query(API_TABLE);
  await executor.query(
    `CREATE INDEX IF NOT EXISTS idx_metrics_system_time ON metrics_system (time DESC)`,
  );
  await executor.query(`CREATE INDEX IF NOT EXISTS idx_metrics_api_time ON metrics_api (time DESC)`);

  if (mode === 'enabled') {
    for (const table of METRIC_TABLES) {
      await bestEffort(log, `create_hypertable(${table})`, () =>
        executor.query(`SELECT create_hypertable($1::regclass, 'time', if_not_exists => TRUE, migrate_data => TRUE)`, [
          table,
        ]),
      );
    }
    const compressAfterDays = options.compressAfterDays ?? 0;
    if (compressAfterDays > 0) {
      await bestEffort(log, 'compression on metrics_api', () =>
        executor.query(
          `ALTER TABLE metrics_api SET (timescaledb.compress, timescaledb.compress_segmentby = 'path')`,
        ),
      );
      await bestEffort(log, 'compression on metrics_system', () =>
        executor.query(`ALTER TABLE metrics_system SET (timescaledb.compress)`),
      );
      for (const table of METRIC_TABLES) {
        await bestEffort(log, `add_compression_policy(${table})`, () =>
          executor.query(
            `SELECT add_compression_policy($1::regclass, make_interval(days => $2), if_not_exists => TRUE)`,
            [table, compressAfterDays],
          ),
        );
      }
    }
    const retentionDays = options.retentionDays ?? 0;
    if (retentionDays > 0) {
      for (const table of METRIC_TABLES) {
        await bestEffort(log, `add_retention_policy(${table})`, () =>
          executor.query(
            `SELECT add_retention_policy($1::regclass, make_interval(days => $2), if_not_exists => TRUE)`,
            [table, retentionDays],
          ),
        );
      }
    }
  }

  if (mode === 'enabled') {
    log.info('[monitoring] TimescaleDB metrics storage initialized');
  } else {
    log.warn('[monitoring] TimescaleDB unavailable; metrics stored in plain Postgres tables');
  }
  return mode;
};

export type MetricsStoreOptions = MetricsSchemaOptions & {
  /**
   * Executor for inserts. Defaults to the read executor; production passes a
   * pool whose `statement_timeout` matches `writeTimeoutMs` so the server
   * cancels a write the store has given up on.
   */
  writer?: MetricsExecutor;
  writeTimeoutMs?: number;
  readTimeoutMs?: number;
  trendBucketMs?: number;
  queueCapacity?: number;
  writeConcurrency?: number;
  now?: () => number;
};

export class MetricsStore {
  readonly writeTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly trendBucketMs: number;
  private readonly now: () => number;
  private readonly writer: MetricsExecutor;
  private readonly log: Logger;
  private readonly apiQueue: WriteQueue<ApiMetricSample>;
  private readonly trendQueries: Record<TrendResource, string>;

  constructor(
    private readonly executor: MetricsExecutor,
    readonly mode: StoreMode,
    options: MetricsStoreOptions = {},
  ) {
    this.writeTimeoutMs = options.writeTimeoutMs ?? 2000;
    this.readTimeoutMs = options.readTimeoutMs ?? 15000;
    this.trendBucketMs = options.trendBucketMs ?? 60000;
    this.now = options.now ?? Date.now;
    this.writer = options.writer ?? executor;
    this.log = (options.logger ?? rootLogger).child({ component: 'metrics-store', mode });
    this.apiQueue = new WriteQueue((sample) => this.insertApiMetric(sample), {
      name: 'monitoring.api_metrics',
      capacity: options.queueCapacity ?? 1000,
      concurrency: options.writeConcurrency ?? 4,
      logger: this.log,
    });
    this.trendQueries = {
      cpu: buildTrendQuery(mode, 'cpu'),
      memory: buildTrendQuery(mode, 'memory'),
      disk: buildTrendQuery(mode, 'disk'),
    };
  }

  static async open(executor: MetricsExecutor, options: MetricsStoreOptions = {}) {
    const mode = await initMetricsSchema(executor, options);
    return new MetricsStore(executor, mode, options);
  }

  get pendingApiWrites() {
    return this.apiQueue.size + this.apiQueue.inFlight;
  }

  async recordSystemMetrics(sample: SystemMetricSample): Promise<void> {
    await withTimeout(
      this.writer.query(
        this.timedQuery(INSERT_SYSTEM, this.writeTimeoutMs, [
          sample.time,
          sample.cpuPercent,
          sample.memUsed,
          sample.memTotal,
          sample.diskUsed,
          sample.diskTotal,
          sample.loadAvg,
        ]),
      ),
      this.writeTimeoutMs,
      'recordSystemMetrics',
    );
    metrics.incrementCounter('monitoring.system_metrics.written');
  }

  /** Returns immediately; the insert runs on the background write queue. */
  recordApiMetric(input: ApiMetricInput): void {
    this.apiQueue.push({ ...input, time: new Date(this.now()) });
  }

  flush(): Promise<void> {
    return this.apiQueue.drain();
  }

  async getApiSummary(windowMs: number): Promise<ApiSummary> {
    const { rows } = await this.read(SELECT_SUMMARY, [this.since(windowMs)], 'getApiSummary');
    if (!rows[0]) {
      return { totalRequests: 0, successRequests: 0, avgDurationMs: 0, p95DurationMs: 0, errorRate: 0 };
    }
    const row = summaryRow.parse(rows[0]);
    return {
      totalRequests: row.total,
      successRequests: row.success,
      avgDurationMs: row.avg_duration,
      p95DurationMs: row.p95_duration,
      errorRate: row.total > 0 ? row.error_rate : 0,
    };
  }

  getCpuTrend(windowMs: number): Promise<TimePoint[]> {
    return this.getTrend('cpu', windowMs);
  }

  getMemoryTrend(windowMs: number): Promise<TimePoint[]> {
    return this.getTrend('memory', windowMs);
  }

  getDiskTrend(windowMs: number): Promise<TimePoint[]> {
    return this.getTrend('disk', windowMs);
  }

  async getTrend(resource: TrendResource, windowMs: number): Promise<TimePoint[]> {
    const { rows } = await this.read(
      this.trendQueries[resource],
      [this.since(windowMs), `${this.trendBucketMs} milliseconds`],
      `get${resource}Trend`,
    );
    const points: TimePoint[] = [];
    for (const raw of rows) {
      const row = trendRow.parse(raw);
      if (row.value === null) continue;
      points.push({ time: row.bucket, value: row.value });
    }
    return points;
  }

  async getApiLogs(query: ApiLogQuery): Promise<ApiMetricSample[]> {
    const { rows } = await this.read(
      SELECT_LOGS,
      [this.since(query.windowMs), query.errorsOnly ?? false, query.limit ?? 100, query.offset ?? 0],
      'getApiLogs',
    );
    return rows.map((raw) => {
      const row = logRow.parse(raw);
      return {
        time: row.time,
        method: row.method,
        path: row.path,
        statusCode: row.status_code,
        durationMs: row.duration_ms,
        ipAddress: row.ip_address ?? '',
      };
    });
  }

  getTopEndpoints(windowMs: number, limit = 10): Promise<EndpointStat[]> {
    return this.endpointStats(SELECT_TOP_ENDPOINTS, windowMs, limit, 'getTopEndpoints');
  }

  getSlowestEndpoints(windowMs: number, limit = 10): Promise<EndpointStat[]> {
    return this.endpointStats(SELECT_SLOWEST_ENDPOINTS, windowMs, limit, 'getSlowestEndpoints');
  }

  private async endpointStats(sql: string, windowMs: number, limit: number, operation: string) {
    const { rows } = await this.read(sql, [this.since(windowMs), limit], operation);
    return rows.map((raw): EndpointStat => {
      const row = endpointRow.parse(raw);
      return {
        path: row.path,
        totalRequests: row.total,
        avgDurationMs: row.avg_duration,
        p95DurationMs: row.p95_duration,
        maxDurationMs: row.max_duration,
        errorCount: row.errors,
      };
    });
  }

  private async insertApiMetric(sample: ApiMetricSample) {
    const insert = this.writer.query(
      this.timedQuery(INSERT_API, this.writeTimeoutMs, [
        sample.time,
        sample.method,
        sample.path,
        sample.statusCode,
        sample.durationMs,
        sample.ipAddress,
      ]),
    );
    try {
      await withTimeout(insert, this.writeTimeoutMs, 'recordApiMetric');
    } catch (err) {
      // The queue slot stays taken until the backend has let go of the statement.
      await Promise.allSettled([insert]);
      throw err;
    }
  }

  private timedQuery(text: string, timeoutMs: number, values: unknown[]): MetricsQuery {
    return { text, values, query_timeout: timeoutMs };
  }

  private read(sql: string, values: unknown[], operation: string) {
    return withTimeout(
      this.executor.query(this.timedQuery(sql, this.readTimeoutMs, values)),
      this.readTimeoutMs,
      operation,
    );
  }

  private since(windowMs: number) {
    return new Date(this.now() - windowMs);
  }
}
