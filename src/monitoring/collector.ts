import { logger as rootLogger, metrics, Logger } from '@telemetry/index';
import { SystemSampler, UsageReading } from './sampler';
import { MetricsStore } from './store';
import { SystemMetricSample } from './types';

export type SystemCollectorOptions = {
  intervalMs?: number;
  diskMount?: string;
  now?: () => number;
  logger?: Logger;
};

const ZERO_USAGE: UsageReading = { used: 0, total: 0 };

/**
 * Periodically samples host resources and writes one row per tick. Sampler
 * failures are replaced by zero readings; write failures drop the sample.
 */
export class SystemCollector {
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<SystemMetricSample | null>;
  private readonly intervalMs: number;
  private readonly diskMount: string;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(
    private readonly sampler: SystemSampler,
    private readonly store: Pick<MetricsStore, 'recordSystemMetrics'>,
    options: SystemCollectorOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 10000;
    this.diskMount = options.diskMount ?? '/';
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: 'system-collector' });
  }

  get started() {
    return this.timer !== undefined;
  }

  start() {
    if (this.timer) return;
    const run = () => {
      if (this.inFlight) {
        this.log.debug('Previous collection still running; skipping tick');
        return;
      }
      this.collectOnce().catch((err) => this.log.error({ err }, 'System collector error'));
    };
    this.timer = setInterval(run, this.intervalMs);
    run();
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /** Runs one cycle; a call made while a cycle is running gets that cycle's result. */
  collectOnce(): Promise<SystemMetricSample | null> {
    if (!this.inFlight) {
      this.inFlight = this.collect().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async collect(): Promise<SystemMetricSample | null> {
    const [cpu, memory, disk, loadAvg] = await Promise.all([
      this.read('cpu', () => this.sampler.sampleCpu(), []),
      this.read('memory', () => this.sampler.sampleMemory(), ZERO_USAGE),
      this.read('disk', () => this.sampler.sampleDisk(this.diskMount), ZERO_USAGE),
      this.read('load', () => this.sampler.sampleLoad(), 0),
    ]);
    if (cpu.length === 0) {
      this.log.warn('No CPU reading available; recording 0');
    }
    const sample: SystemMetricSample = {
      time: new Date(this.now()),
      cpuPercent: cpu[0] ?? 0,
      memUsed: memory.used,
      memTotal: memory.total,
      diskUsed: disk.used,
      diskTotal: disk.total,
      loadAvg,
    };
    try {
      await this.store.recordSystemMetrics(sample);
    } catch (err) {
      metrics.incrementCounter('monitoring.system_metrics.failed');
      this.log.warn({ err }, 'Failed to record system metrics; sample dropped');
      return null;
    }
    return sample;
  }

  private async read<T>(reading: string, sample: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await sample();
    } catch (err) {
      this.log.warn({ err, reading }, 'Sampler reading failed; substituting zero');
      return fallback;
    }
  }
}
