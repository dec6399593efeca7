import { WriteQueue } from '@monitoring/queue';
import { metrics } from '@telemetry/index';

describe('WriteQueue', () => {
  it('drops the oldest pending item when full', async () => {
    const started: number[] = [];
    const dropped: number[] = [];
    const queue = new WriteQueue<number>(
      async (item) => {
        started.push(item);
      },
      { name: 'test.drop_oldest', capacity: 2, concurrency: 1 },
    );
    queue.on('drop', (item) => dropped.push(item));

    [1, 2, 3, 4].forEach((item) => queue.push(item));
    await queue.drain();

    expect(started).toEqual([1, 3, 4]);
    expect(dropped).toEqual([2]);
    expect(metrics.get('test.drop_oldest.dropped')).toBe(1);
    expect(metrics.get('test.drop_oldest.written')).toBe(3);
  });

  it('caps the number of writes in flight', async () => {
    const releases: Array<() => void> = [];
    const queue = new WriteQueue<string>(
      () =>
        new Promise<void>((resolve) => {
          releases.push(resolve);
        }),
      { name: 'test.concurrency', capacity: 10, concurrency: 2 },
    );

    ['a', 'b', 'c', 'd', 'e'].forEach((item) => queue.push(item));
    expect(queue.inFlight).toBe(2);
    expect(queue.size).toBe(3);
    expect(metrics.get('test.concurrency.pending')).toBe(3);

    const drained = queue.drain();
    while (releases.length) {
      const release = releases.shift();
      release?.();
      await new Promise((resolve) => setImmediate(resolve));
    }
    await drained;
    expect(queue.inFlight).toBe(0);
    expect(queue.size).toBe(0);
    expect(metrics.get('test.concurrency.pending')).toBe(0);
  });

  it('logs and counts failed writes, then keeps draining', async () => {
    const written: string[] = [];
    const queue = new WriteQueue<string>(
      async (item) => {
        if (item === 'bad') throw new Error('insert failed');
        written.push(item);
      },
      { name: 'test.failures', capacity: 10, concurrency: 1 },
    );

    queue.push('first');
    queue.push('bad');
    queue.push('last');
    await queue.drain();

    expect(written).toEqual(['first', 'last']);
    expect(metrics.get('test.failures.failed')).toBe(1);
  });

  it('resolves drain immediately when idle', async () => {
    const queue = new WriteQueue<number>(async () => undefined, { capacity: 1, concurrency: 1 });
    await expect(queue.drain()).resolves.toBeUndefined();
  });
});
