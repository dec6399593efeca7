import EventEmitter from 'eventemitter3';
import { logger as rootLogger, metrics, Logger } from '@telemetry/index';

type QueueEvents<T> = {
  drop: (item: T) => void;
  idle: () => void;
};

export type WriteQueueOptions = {
  capacity: number;
  concurrency: number;
  logger?: Logger;
  name?: string;
};

/**
 * Bounded fire-and-forget write queue. `push` never blocks: when the queue is
 * full the oldest pending item is dropped to make room. At most `concurrency`
 * writes are in flight; a failed write is logged and counted, never rethrown.
 */
export class WriteQueue<T> extends EventEmitter<QueueEvents<T>> {
  private pending: T[] = [];
  private active = 0;
  private readonly capacity: number;
  private readonly concurrency: number;
  private readonly log: Logger;
  private readonly name: string;

  constructor(
    private readonly write: (item: T) => Promise<void>,
    options: WriteQueueOptions,
  ) {
    super();
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.name = options.name ?? 'write_queue';
    this.log = (options.logger ?? rootLogger).child({ queue: this.name });
  }

  get size() {
    return this.pending.length;
  }

  get inFlight() {
    return this.active;
  }

  push(item: T) {
    if (this.pending.length >= this.capacity) {
      const dropped = this.pending.shift();
      metrics.incrementCounter(`${this.name}.dropped`);
      if (dropped !== undefined) {
        this.emit('drop', dropped);
      }
      this.log.debug({ capacity: this.capacity }, 'Write queue full, dropped oldest item');
    }
    this.pending.push(item);
    this.pump();
    metrics.setGauge(`${this.name}.pending`, this.pending.length);
  }

  /** Resolves once nothing is pending or in flight. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.once('idle', () => resolve());
    });
  }

  private isIdle() {
    return this.active === 0 && this.pending.length === 0;
  }

  private pump() {
    while (this.active < this.concurrency && this.pending.length > 0) {
      const item = this.pending.shift();
      if (item === undefined) break;
      this.active += 1;
      void this.run(item)
        .catch((err) => {
          metrics.incrementCounter(`${this.name}.failed`);
          this.log.warn({ err }, 'Queued metric write failed');
        })
        .finally(() => {
          this.active -= 1;
          this.pump();
          metrics.setGauge(`${this.name}.pending`, this.pending.length);
          if (this.isIdle()) {
            this.emit('idle');
          }
        });
    }
  }

  private async run(item: T) {
    await this.write(item);
    metrics.incrementCounter(`${this.name}.written`);
  }
}
