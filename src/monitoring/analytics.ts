import { MetricsStore, TrendResource } from './store';
import { ApiMetricSample, ApiSummary, EndpointStat, StoreMode, TimePoint } from './types';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const DEFAULT_RANGE_MS = HOUR;

const NAMED_RANGES: Record<string, number> = {
  '5m': 5 * MINUTE,
  '15m': 15 * MINUTE,
  '30m': 30 * MINUTE,
  '1h': HOUR,
  '3h': 3 * HOUR,
  '6h': 6 * HOUR,
  '12h': 12 * HOUR,
  '24h': DAY,
  '1d': DAY,
  '3d': 3 * DAY,
  '7d': 7 * DAY,
  '1w': 7 * DAY,
  '30d': 30 * DAY,
};

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: MINUTE,
  h: HOUR,
  d: DAY,
  w: 7 * DAY,
};

/** Turns a dashboard range such as `15m` or `7d` into milliseconds. */
export const parseRange = (range: string | undefined, fallbackMs = DEFAULT_RANGE_MS): number => {
  if (!range) return fallbackMs;
  const trimmed = range.trim();
  const named = NAMED_RANGES[trimmed];
  if (named) return named;
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h|d|w)$/.exec(trimmed);
  if (!match) return fallbackMs;
  const value = Number(match[1]) * UNIT_MS[match[2]];
  return value > 0 ? value : fallbackMs;
};

export type MonitoringOverview = {
  mode: StoreMode;
  rangeMs: number;
  summary: ApiSummary;
  cpu: TimePoint[];
};

/** Read-only facade over the metrics store for reporting endpoints. */
export class MonitoringAnalytics {
  constructor(private readonly store: MetricsStore) {}

  get mode(): StoreMode {
    return this.store.mode;
  }

  getApiSummary(range?: string): Promise<ApiSummary> {
    return this.store.getApiSummary(parseRange(range));
  }

  getCpuTrend(range?: string): Promise<TimePoint[]> {
    return this.store.getCpuTrend(parseRange(range));
  }

  getTrend(resource: TrendResource, range?: string): Promise<TimePoint[]> {
    return this.store.getTrend(resource, parseRange(range));
  }

  getApiLogs(range?: string, options: { errorsOnly?: boolean; limit?: number; offset?: number } = {}): Promise<ApiMetricSample[]> {
    return this.store.getApiLogs({ windowMs: parseRange(range), ...options });
  }

  getTopEndpoints(range?: string, limit?: number): Promise<EndpointStat[]> {
    return this.store.getTopEndpoints(parseRange(range), limit);
  }

  getSlowestEndpoints(range?: string, limit?: number): Promise<EndpointStat[]> {
    return this.store.getSlowestEndpoints(parseRange(range), limit);
  }

  async overview(range?: string): Promise<MonitoringOverview> {
    const rangeMs = parseRange(range);
    const [summary, cpu] = await Promise.all([
      this.store.getApiSummary(rangeMs),
      this.store.getCpuTrend(rangeMs),
    ]);
    return { mode: this.store.mode, rangeMs, summary, cpu };
  }
}
