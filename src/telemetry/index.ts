import pino from 'pino';
import EventEmitter from 'eventemitter3';
import config from '@config';

export const logger = pino({
  level: config.logLevel,
  transport:
    config.env === 'production' || config.env === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: { colorize: true },
        },
});

export type Logger = pino.Logger;

export type MetricEvent = {
  type: 'gauge' | 'counter';
  name: string;
  value: number;
  ts: number;
};

type MetricEvents = {
  metric: (event: MetricEvent) => void;
};

export class MetricCollector extends EventEmitter<MetricEvents> {
  private gauges: Record<string, number> = {};

  setGauge(name: string, value: number) {
    this.gauges[name] = value;
    this.emit('metric', { type: 'gauge', name, value, ts: Date.now() });
  }

  incrementCounter(name: string, delta = 1) {
    this.gauges[name] = (this.gauges[name] || 0) + delta;
    this.emit('metric', { type: 'counter', name, value: this.gauges[name], ts: Date.now() });
  }

  get(name: string) {
    return this.gauges[name] ?? 0;
  }

  snapshot() {
    return { ...this.gauges };
  }
}

// Self-metrics of the observability pipeline (drops, write failures).
export const metrics = new MetricCollector();
